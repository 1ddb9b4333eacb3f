import { Injectable, Logger } from '@nestjs/common';
import { v5 as uuidv5 } from 'uuid';
import {
  CyberObservable,
  ExternalReference,
  GranularMarking,
  KillChainPhase,
  StixObject,
} from '../../core/types/stix-types';
import { EmbeddedKind, PropertySpec, isEmbeddedKind, propertiesFor } from '../../core/types/stix-properties';
import { StixValidationError, errorMessage } from '../../core/exception/custom-exceptions';
import { GraphProperties, GraphPropertyValue } from '../graph-store/graph-store.interface';
import { MappingContext } from './mapping-context';

// namespace used by STIX 2.1 for deterministic identifiers
export const STIX_NAMESPACE = '00abedb4-aa42-466c-9c01-fed23315a9b7';

const SATELLITES = {
  'external-references': { prefix: 'external-reference', label: 'ExternalReference', edge: 'HAS_EXTERNAL_REF' },
  'granular-markings': { prefix: 'granular-marking', label: 'GranularMarking', edge: 'HAS_GRANULAR_MARKING' },
  'kill-chain-phases': { prefix: 'kill-chain-phase', label: 'KillChainPhase', edge: 'HAS_KILL_CHAIN_PHASE' },
} as const;

export const HAS_OBSERVABLE = 'HAS_OBSERVABLE';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Turns any type tag or relationship type into a usable graph label. */
export function asCleanLabel(text: string): string {
  const cleaned = text.replace(/[^A-Za-z0-9_]/g, '_');
  if (cleaned.length === 0) {
    return 'UNKNOWN';
  }
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}

export function satelliteId(prefix: string, ownerId: string, field: string, key: string | number): string {
  return `${prefix}--${uuidv5(`${ownerId}:${field}:${key}`, STIX_NAMESPACE)}`;
}

function observableType(observable: unknown): string {
  return isRecord(observable) && typeof observable.type === 'string' ? observable.type : 'observable';
}

/** Ids of the satellites an embedded collection turns into, in entry order. */
export function toIdArray(ownerId: string, field: string, kind: EmbeddedKind, value: unknown): string[] {
  if (kind === 'observables') {
    if (!isRecord(value)) {
      return [];
    }
    return Object.entries(value).map(([key, observable]) =>
      satelliteId(observableType(observable), ownerId, field, key),
    );
  }
  if (!Array.isArray(value)) {
    return [];
  }
  return value.map((_entry, i) => satelliteId(SATELLITES[kind].prefix, ownerId, field, i));
}

export function toIdStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/** Nested values that have no graph representation of their own are stored as JSON text. */
export function toGraphValue(value: unknown): GraphPropertyValue | undefined {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value === null || value === undefined) {
    return undefined;
  }
  if (Array.isArray(value)) {
    if (value.every((v): v is string => typeof v === 'string')) {
      return value;
    }
    if (value.every((v): v is number => typeof v === 'number')) {
      return value;
    }
    if (value.every((v): v is boolean => typeof v === 'boolean')) {
      return value;
    }
  }
  return JSON.stringify(value);
}

export function customFields(record: Record<string, unknown>, specs: ReadonlyArray<PropertySpec>): Record<string, unknown> {
  const known = new Set(specs.map((spec) => spec.name));
  const custom: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!known.has(key)) {
      custom[key] = value;
    }
  }
  return custom;
}

export function asJsonString(custom: Record<string, unknown>): string {
  return Object.keys(custom).length === 0 ? '' : JSON.stringify(custom);
}

function propertyValue(ownerId: string, spec: PropertySpec, value: unknown): GraphPropertyValue | undefined {
  if (isEmbeddedKind(spec.kind)) {
    return toIdArray(ownerId, spec.name, spec.kind, value);
  }
  switch (spec.kind) {
    case 'string':
    case 'timestamp':
    case 'identifier':
      return typeof value === 'string' ? value : '';
    case 'string-list':
    case 'identifier-list':
      return toIdStringArray(value);
    case 'number':
    case 'integer':
      return typeof value === 'number' ? value : undefined;
    case 'boolean':
      return typeof value === 'boolean' ? value : false;
    case 'json':
      return value === undefined ? '' : JSON.stringify(value);
  }
}

/**
 * Flat property bag of a node. Every property in the variant's table is
 * present (numbers excepted), so two objects of one type always produce the
 * same key set. Fields outside the table end up in `custom`.
 */
export function asNodeProperties(obj: StixObject): GraphProperties {
  const specs = propertiesFor(obj.type);
  if (!specs) {
    throw new StixValidationError(`unsupported STIX type ${obj.type}`);
  }
  const record: Record<string, unknown> = obj;
  const properties: GraphProperties = {};
  for (const spec of specs) {
    const value = propertyValue(obj.id, spec, record[spec.name]);
    if (value !== undefined) {
      properties[spec.name] = value;
    }
  }
  properties.custom = asJsonString(customFields(record, specs));
  return properties;
}

@Injectable()
export class MakerSupportService {
  private readonly logger = new Logger(MakerSupportService.name);

  /** One edge in its own transaction. Returns false, after logging, when it could not be made. */
  async createEdge(
    context: MappingContext,
    sourceId: string,
    targetId: string,
    label: string,
    properties: GraphProperties = {},
  ): Promise<boolean> {
    try {
      await context.store.transaction(async (tx) => {
        const source = await context.index.require(tx, sourceId);
        const target = await context.index.require(tx, targetId);
        await tx.createEdge(source, target, label, properties);
      });
      return true;
    } catch (error) {
      this.logger.error(`could not create ${label} edge from ${sourceId} to ${targetId}: ${errorMessage(error)}`);
      return false;
    }
  }

  /** One edge per target id; a failed target does not stop the others. */
  async createRelToObjRef(
    context: MappingContext,
    sourceId: string,
    targetIds: ReadonlyArray<string> | undefined,
    label: string,
  ): Promise<number> {
    let created = 0;
    for (const targetId of targetIds ?? []) {
      if (await this.createEdge(context, sourceId, targetId, label)) {
        created++;
      }
    }
    return created;
  }

  async createdByRel(context: MappingContext, sourceId: string, createdByRef: string | undefined): Promise<boolean> {
    if (!createdByRef) {
      return false;
    }
    return this.createEdge(context, sourceId, createdByRef, 'CREATED_BY');
  }

  async createExternRefs(
    context: MappingContext,
    ownerId: string,
    refs: ReadonlyArray<ExternalReference> | undefined,
  ): Promise<string[]> {
    const { prefix, label, edge } = SATELLITES['external-references'];
    const ids: string[] = [];
    for (const [i, ref] of (refs ?? []).entries()) {
      const id = satelliteId(prefix, ownerId, 'external_references', i);
      const created = await this.createSatellite(context, ownerId, label, edge, {
        id,
        source_name: ref.source_name,
        description: ref.description ?? '',
        url: ref.url ?? '',
        external_id: ref.external_id ?? '',
        hashes: ref.hashes ? JSON.stringify(ref.hashes) : '',
      });
      if (created) {
        ids.push(id);
      }
    }
    return ids;
  }

  async createGranulars(
    context: MappingContext,
    ownerId: string,
    markings: ReadonlyArray<GranularMarking> | undefined,
  ): Promise<string[]> {
    const { prefix, label, edge } = SATELLITES['granular-markings'];
    const ids: string[] = [];
    for (const [i, marking] of (markings ?? []).entries()) {
      const id = satelliteId(prefix, ownerId, 'granular_markings', i);
      const created = await this.createSatellite(context, ownerId, label, edge, {
        id,
        selectors: marking.selectors,
        marking_ref: marking.marking_ref ?? '',
        lang: marking.lang ?? '',
      });
      if (created) {
        ids.push(id);
      }
    }
    return ids;
  }

  async createKillPhases(
    context: MappingContext,
    ownerId: string,
    phases: ReadonlyArray<KillChainPhase> | undefined,
  ): Promise<string[]> {
    const { prefix, label, edge } = SATELLITES['kill-chain-phases'];
    const ids: string[] = [];
    for (const [i, phase] of (phases ?? []).entries()) {
      const id = satelliteId(prefix, ownerId, 'kill_chain_phases', i);
      const created = await this.createSatellite(context, ownerId, label, edge, {
        id,
        kill_chain_name: phase.kill_chain_name,
        phase_name: phase.phase_name,
      });
      if (created) {
        ids.push(id);
      }
    }
    return ids;
  }

  async createObservables(
    context: MappingContext,
    ownerId: string,
    objects: Record<string, CyberObservable> | undefined,
  ): Promise<string[]> {
    const ids: string[] = [];
    for (const [key, observable] of Object.entries(objects ?? {})) {
      const id = satelliteId(observableType(observable), ownerId, 'objects', key);
      const properties: GraphProperties = {};
      for (const [name, value] of Object.entries(observable)) {
        const converted = toGraphValue(value);
        if (converted !== undefined) {
          properties[name] = converted;
        }
      }
      properties.object_key = key;
      properties.id = id;
      if (await this.createSatellite(context, ownerId, asCleanLabel(observable.type), HAS_OBSERVABLE, properties)) {
        ids.push(id);
      }
    }
    return ids;
  }

  // satellite node and its link from the owner commit together
  private async createSatellite(
    context: MappingContext,
    ownerId: string,
    label: string,
    edgeLabel: string,
    properties: GraphProperties,
  ): Promise<boolean> {
    try {
      await context.store.transaction(async (tx) => {
        const owner = await context.index.require(tx, ownerId);
        const node = await tx.createNode(label, properties);
        await tx.createEdge(owner, node, edgeLabel, {});
      });
      return true;
    } catch (error) {
      this.logger.error(`could not create ${label} for ${ownerId}: ${errorMessage(error)}`);
      return false;
    }
  }
}
