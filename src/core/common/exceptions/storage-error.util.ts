import { BadRequestException, ConflictException } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';

// PostgreSQL SQLSTATE codes raised by column and table constraints
const INVALID_INPUT_CODES: Record<string, string> = {
  '22001': 'Value too long for column',
  '22P02': 'Invalid value for column type',
  '23502': 'Required field is missing',
  '23514': 'Check constraint violated',
};

const CONFLICT_CODES: Record<string, string> = {
  '23503': 'Referenced row does not exist',
  '23505': 'Duplicate value violates unique constraint',
};

function readDriverCode(driverError: unknown): string | undefined {
  if (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string'
  ) {
    return driverError.code;
  }
  return undefined;
}

function readConstraint(driverError: unknown): string | undefined {
  if (
    typeof driverError === 'object' &&
    driverError !== null &&
    'constraint' in driverError &&
    typeof driverError.constraint === 'string'
  ) {
    return driverError.constraint;
  }
  return undefined;
}

/**
 * Maps a storage-layer constraint violation onto the HTTP exception
 * callers expect. Anything that is not a recognised violation is
 * returned unchanged so it can be rethrown as is.
 */
export function translateStorageError(error: unknown): unknown {
  if (!(error instanceof QueryFailedError)) {
    return error;
  }

  const code = readDriverCode(error.driverError);
  if (code === undefined) {
    return error;
  }

  const constraint = readConstraint(error.driverError);
  const body = (message: string) => ({
    message,
    code,
    ...(constraint ? { constraint } : {}),
  });

  if (code in INVALID_INPUT_CODES) {
    return new BadRequestException(body(INVALID_INPUT_CODES[code]));
  }
  if (code in CONFLICT_CODES) {
    return new ConflictException(body(CONFLICT_CODES[code]));
  }
  return error;
}
