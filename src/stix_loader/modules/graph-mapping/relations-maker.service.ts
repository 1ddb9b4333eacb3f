import { Injectable, Logger } from '@nestjs/common';
import {
  Identifier,
  LanguageContent,
  Relationship,
  Sighting,
  StixDomainObject,
  StixObject,
  StixRelationshipObject,
} from '../../core/types/stix-types';
import { errorMessage } from '../../core/exception/custom-exceptions';
import { GraphProperties } from '../graph-store/graph-store.interface';
import { MakerSupportService, asCleanLabel, asNodeProperties } from './maker-support.service';
import { MappingContext } from './mapping-context';

export const HAS_MARKING = 'HAS_MARKING';
export const REFERS_TO = 'REFERS_TO';
export const SIGHTING_OF = 'sighting_of';
export const SIGHTED_OBSERVED_DATA = 'SIGHTED_OBSERVED_DATA';
export const WAS_SIGHTED_BY = 'WAS_SIGHTED_BY';

// properties every relationship edge carries, taken from the object's node bag
const BASE_EDGE_PROPERTIES = [
  'id',
  'type',
  'created',
  'modified',
  'revoked',
  'labels',
  'external_references',
  'object_marking_refs',
  'granular_markings',
  'created_by_ref',
  'custom',
] as const;

interface Referencing {
  id: Identifier;
  object_marking_refs?: Identifier[];
  created_by_ref?: Identifier;
}

function objectRefsOf(obj: StixDomainObject): Identifier[] | undefined {
  switch (obj.type) {
    case 'report':
    case 'grouping':
    case 'note':
    case 'opinion':
    case 'observed-data':
      return obj.object_refs;
    default:
      return undefined;
  }
}

export function baseEdgeProperties(obj: StixRelationshipObject): GraphProperties {
  const node = asNodeProperties(obj);
  const properties: GraphProperties = {};
  for (const name of BASE_EDGE_PROPERTIES) {
    const value = node[name];
    if (value !== undefined) {
      properties[name] = value;
    }
  }
  return properties;
}

export function relationshipEdgeProperties(obj: Relationship): GraphProperties {
  return {
    ...baseEdgeProperties(obj),
    source_ref: obj.source_ref,
    target_ref: obj.target_ref,
    relationship_type: obj.relationship_type,
    description: obj.description ?? '',
  };
}

export function sightingEdgeProperties(obj: Sighting): GraphProperties {
  return {
    ...baseEdgeProperties(obj),
    sighting_of_ref: obj.sighting_of_ref,
    first_seen: obj.first_seen ?? '',
    last_seen: obj.last_seen ?? '',
    count: obj.count ?? 0,
    summary: obj.summary ?? false,
    observed_data_id: obj.observed_data_refs ?? [],
    where_sighted_refs_id: obj.where_sighted_refs ?? [],
    description: obj.description ?? '',
  };
}

@Injectable()
export class RelationsMakerService {
  private readonly logger = new Logger(RelationsMakerService.name);

  constructor(private readonly support: MakerSupportService) {}

  /**
   * Creates every edge one STIX object implies. Unresolvable edges are logged
   * and skipped. Objects whose node this run did not create (duplicates, or
   * nodes left by an earlier run) get no edges, and each id is handled once.
   */
  async createRelations(obj: StixObject, context: MappingContext): Promise<void> {
    if (!context.pendingRelations.delete(obj.id)) {
      this.logger.debug(`skipping relations of ${obj.id}: node not created in this run`);
      return;
    }
    try {
      switch (obj.type) {
        case 'relationship':
          await this.createRelationshipRel(obj, context);
          break;
        case 'sighting':
          await this.createSightingRel(obj, context);
          break;
        case 'marking-definition':
          await this.createCommonRels(obj, context);
          break;
        case 'language-content':
          await this.createLanguageContentRel(obj, context);
          break;
        default:
          await this.createDomainObjectRel(obj, context);
      }
    } catch (error) {
      this.logger.error(`could not create relations of ${obj.id}: ${errorMessage(error)}`);
    }
  }

  private async createCommonRels(obj: Referencing, context: MappingContext): Promise<void> {
    await this.support.createRelToObjRef(context, obj.id, obj.object_marking_refs, HAS_MARKING);
    await this.support.createdByRel(context, obj.id, obj.created_by_ref);
  }

  private async createDomainObjectRel(obj: StixDomainObject, context: MappingContext): Promise<void> {
    await this.createCommonRels(obj, context);
    await this.support.createRelToObjRef(context, obj.id, objectRefsOf(obj), REFERS_TO);
  }

  private async createLanguageContentRel(obj: LanguageContent, context: MappingContext): Promise<void> {
    await this.createCommonRels(obj, context);
    await this.support.createEdge(context, obj.id, obj.object_ref, asCleanLabel(obj.type), {
      object_modified: obj.object_modified,
    });
  }

  private async createRelationshipRel(obj: Relationship, context: MappingContext): Promise<void> {
    const created = await this.support.createEdge(
      context,
      obj.source_ref,
      obj.target_ref,
      asCleanLabel(obj.relationship_type),
      relationshipEdgeProperties(obj),
    );
    if (!created) {
      this.logger.error(`could not process relation: ${obj.id} from: ${obj.source_ref} to: ${obj.target_ref}`);
      return;
    }
    await this.createRelationshipSatellites(obj, context);
  }

  // the base edge is a self-loop on the sighted object
  private async createSightingRel(obj: Sighting, context: MappingContext): Promise<void> {
    const created = await this.support.createEdge(
      context,
      obj.sighting_of_ref,
      obj.sighting_of_ref,
      SIGHTING_OF,
      sightingEdgeProperties(obj),
    );
    if (!created) {
      this.logger.error(
        `could not process relation: ${obj.id} from: ${obj.sighting_of_ref} to: ${obj.sighting_of_ref}`,
      );
      return;
    }
    await this.support.createRelToObjRef(context, obj.id, obj.observed_data_refs, SIGHTED_OBSERVED_DATA);
    await this.support.createRelToObjRef(context, obj.sighting_of_ref, obj.where_sighted_refs, WAS_SIGHTED_BY);
    await this.createRelationshipSatellites(obj, context);
  }

  private async createRelationshipSatellites(obj: StixRelationshipObject, context: MappingContext): Promise<void> {
    await this.createCommonRels(obj, context);
    await this.support.createExternRefs(context, obj.id, obj.external_references);
    await this.support.createGranulars(context, obj.id, obj.granular_markings);
  }
}
