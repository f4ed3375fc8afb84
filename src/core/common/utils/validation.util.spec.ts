import { BadRequestException } from '@nestjs/common';
import {
  IsInt,
  IsString,
  MaxLength,
  Min,
  ValidateNested,
  validate,
} from 'class-validator';
import { Type } from 'class-transformer';
import { assertValid, flattenValidationErrors } from './validation.util';

class ChildDto {
  @IsInt()
  @Min(0)
  position!: number;
}

class ParentDto {
  @IsString()
  @MaxLength(5)
  name!: string;

  @ValidateNested()
  @Type(() => ChildDto)
  child!: ChildDto;
}

describe('validation utils', () => {
  describe('assertValid', () => {
    it('should return a DTO instance for valid input', async () => {
      const dto = await assertValid(ParentDto, {
        name: 'abc',
        child: { position: 1 },
      });

      expect(dto).toBeInstanceOf(ParentDto);
      expect(dto.child).toBeInstanceOf(ChildDto);
      expect(dto.name).toBe('abc');
    });

    it('should throw BadRequestException listing each failure', async () => {
      const error = await assertValid(ParentDto, {
        name: 'abcdef',
        child: { position: -1 },
      }).catch((e: unknown) => e);

      if (!(error instanceof BadRequestException)) {
        throw error;
      }
      expect(error.getResponse()).toEqual({
        message: 'Validation failed',
        errors: [
          'name: name must be shorter than or equal to 5 characters',
          'child.position: position must not be less than 0',
        ],
      });
    });

    it('should reject properties the DTO does not declare', async () => {
      await expect(
        assertValid(ParentDto, {
          name: 'abc',
          child: { position: 0 },
          extra: true,
        }),
      ).rejects.toThrow(BadRequestException);
    });
  });

  describe('flattenValidationErrors', () => {
    it('should return an empty list for a valid object', async () => {
      const dto = new ChildDto();
      dto.position = 3;

      expect(flattenValidationErrors(await validate(dto))).toEqual([]);
    });
  });
});
