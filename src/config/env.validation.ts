import * as Joi from 'joi';
import { DEFAULT_TIMEZONE } from '../constants';

const requiredForPostgres = (schema: Joi.Schema) =>
  Joi.when('DATABASE_TYPE', {
    is: 'postgres',
    then: schema.required(),
    otherwise: schema.optional(),
  });

export const envValidationSchema = Joi.object({
  PORT: Joi.number().port().default(3000),

  DATABASE_TYPE: Joi.string()
    .valid('postgres', 'better-sqlite3')
    .default('postgres'),
  POSTGRES_HOST: requiredForPostgres(Joi.string()),
  POSTGRES_PORT: requiredForPostgres(Joi.number()),
  POSTGRES_USER: requiredForPostgres(Joi.string()),
  POSTGRES_PASSWORD: requiredForPostgres(Joi.string()),
  POSTGRES_DB: requiredForPostgres(Joi.string()),
  SQLITE_DATABASE: Joi.string().default(':memory:'),
  DATABASE_SYNCHRONIZE: Joi.boolean().default(false),

  JWT_SECRET: Joi.string().required(),
  JWT_EXPIRES_IN: Joi.string().default('1d'),

  APP_TIMEZONE: Joi.string().default(DEFAULT_TIMEZONE),
  IMAGES_DIR: Joi.string().default('images'),
  SEED_DEFAULT_DATA: Joi.boolean().default(true),
  SEED_FAKE_ORDERS: Joi.number().integer().min(0).default(0),
  CACHE_TTL: Joi.number().integer().min(1).default(60),
  MENU_PAGE_SIZE: Joi.number().integer().min(1).default(6),
});
