import { registerAs } from '@nestjs/config';
import * as Joi from 'joi';

export interface LoaderConfig {
  entryExtensions: string[]; // archive entries handled as STIX data files
}

export const LOADER_CONFIG_KEY = 'loader';

export function parseExtensions(value: string): string[] {
  return value
    .split(',')
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}

export default registerAs(LOADER_CONFIG_KEY, (): LoaderConfig => ({
  entryExtensions: parseExtensions(process.env.LOADER_ENTRY_EXTENSIONS || '.json'),
}));

export const loaderConfigSchema = Joi.object({
  LOADER_ENTRY_EXTENSIONS: Joi.string().default('.json'),
  LOG_LEVEL: Joi.string().valid('fatal', 'error', 'warn', 'log', 'debug', 'verbose').default('log'),
});
