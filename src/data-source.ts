import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { ConfigService } from '@nestjs/config';
import * as dotenv from 'dotenv';
import { createDataSourceOptions } from './core/database/typeorm.config';

// The TypeORM CLI runs outside Nest, so .env is loaded by hand
dotenv.config();

export default new DataSource({
  ...createDataSourceOptions(new ConfigService()),
  synchronize: false,
});
