import * as Joi from 'joi';
import { PropertyKind, PropertySpec, propertiesFor } from '../../core/types/stix-properties';
import { StixObject } from '../../core/types/stix-types';

const IDENTIFIER_PATTERN = /^[a-z][a-z0-9-]*--\S+$/;

const identifier = Joi.string().pattern(IDENTIFIER_PATTERN, 'STIX identifier');
const timestamp = Joi.string().isoDate();

const externalReference = Joi.object({
  source_name: Joi.string().required(),
  description: Joi.string(),
  url: Joi.string(),
  hashes: Joi.object().pattern(Joi.string(), Joi.string()),
  external_id: Joi.string(),
}).unknown(true);

const granularMarking = Joi.object({
  selectors: Joi.array().items(Joi.string()).min(1).required(),
  marking_ref: identifier,
  lang: Joi.string(),
}).unknown(true);

const killChainPhase = Joi.object({
  kill_chain_name: Joi.string().required(),
  phase_name: Joi.string().required(),
}).unknown(true);

const cyberObservable = Joi.object({
  type: Joi.string().required(),
}).unknown(true);

const KIND_SCHEMAS: Record<PropertyKind, Joi.Schema> = {
  string: Joi.string().allow(''),
  timestamp,
  identifier,
  'string-list': Joi.array().items(Joi.string()),
  'identifier-list': Joi.array().items(identifier),
  number: Joi.number(),
  integer: Joi.number().integer(),
  boolean: Joi.boolean(),
  json: Joi.object().unknown(true),
  'external-references': Joi.array().items(externalReference),
  'granular-markings': Joi.array().items(granularMarking),
  'kill-chain-phases': Joi.array().items(killChainPhase),
  observables: Joi.object().pattern(Joi.string(), cyberObservable),
};

// convert: false keeps timestamps and numbers exactly as they were written
export const VALIDATION_OPTIONS: Joi.ValidationOptions = {
  abortEarly: false,
  allowUnknown: true,
  convert: false,
};

export function buildObjectSchema(type: string, specs: ReadonlyArray<PropertySpec>): Joi.ObjectSchema<StixObject> {
  const keys: Record<string, Joi.Schema> = {};
  for (const spec of specs) {
    const schema = spec.name === 'type' ? Joi.string().valid(type) : KIND_SCHEMAS[spec.kind];
    keys[spec.name] = spec.required ? schema.required() : schema;
  }
  return Joi.object(keys).unknown(true);
}

export type BundleEnvelope = {
  type: 'bundle';
  id: string;
  spec_version?: string;
  objects: unknown[];
};

export const bundleSchema: Joi.ObjectSchema<BundleEnvelope> = Joi.object({
  type: Joi.string().valid('bundle').required(),
  id: identifier.required(),
  spec_version: Joi.string(),
  objects: Joi.array().items(Joi.any()).default([]),
}).unknown(true);

const schemaCache = new Map<string, Joi.ObjectSchema<StixObject>>();

/** Schema for a STIX type tag, or undefined for types outside the taxonomy. */
export function schemaFor(type: string): Joi.ObjectSchema<StixObject> | undefined {
  const cached = schemaCache.get(type);
  if (cached) {
    return cached;
  }
  const specs = propertiesFor(type);
  if (!specs) {
    return undefined;
  }
  const schema = buildObjectSchema(type, specs);
  schemaCache.set(type, schema);
  return schema;
}
