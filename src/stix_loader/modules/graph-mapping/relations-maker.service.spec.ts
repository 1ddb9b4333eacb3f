import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { GraphMappingModule } from './graph-mapping.module';
import { NodesMakerService } from './nodes-maker.service';
import { RelationsMakerService } from './relations-maker.service';
import { createMappingContext, MappingContext } from './mapping-context';
import { satelliteId } from './maker-support.service';
import { InMemoryGraphStore } from '../graph-store/in-memory-graph-store';
import { StixObject } from '../../core/types/stix-types';
import {
  IDENTITY_ID,
  INDICATOR_ID,
  LANGUAGE_CONTENT_ID,
  MALWARE_ID,
  MARKING_ID,
  MARKING_ID_2,
  OBSERVED_DATA_ID,
  RELATIONSHIP_ID,
  REPORT_ID,
  SIGHTING_ID,
  T0,
  T1,
  makeIdentity,
  makeIndicator,
  makeLanguageContent,
  makeMalware,
  makeMarking,
  makeObservedData,
  makeRelationship,
  makeReport,
  makeSighting,
} from '../../testing/stix-fixtures';

describe('RelationsMakerService', () => {
  let nodesMaker: NodesMakerService;
  let relationsMaker: RelationsMakerService;
  let store: InMemoryGraphStore;
  let context: MappingContext;
  let errorSpy: jest.SpyInstance;
  let debugSpy: jest.SpyInstance;

  async function ingest(objects: StixObject[]): Promise<void> {
    for (const obj of objects) {
      await nodesMaker.createNodes(obj, context);
    }
    for (const obj of objects) {
      await relationsMaker.createRelations(obj, context);
    }
  }

  function endpoints(label: string): Array<[string, string]> {
    return store.edgesBetweenIds(label).map((edge) => [edge.from, edge.to]);
  }

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    debugSpy = jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);

    const moduleRef = await Test.createTestingModule({
      imports: [GraphMappingModule],
    }).compile();
    nodesMaker = moduleRef.get(NodesMakerService);
    relationsMaker = moduleRef.get(RelationsMakerService);

    store = new InMemoryGraphStore();
    await store.open('memory://test');
    context = createMappingContext(store);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('domain objects', () => {
    it('creates exactly one HAS_MARKING edge per marking reference', async () => {
      await ingest([
        makeMarking(),
        makeMarking({ id: MARKING_ID_2 }),
        makeIdentity(),
        makeIndicator({ object_marking_refs: [MARKING_ID, MARKING_ID_2], created_by_ref: IDENTITY_ID }),
      ]);

      expect(endpoints('HAS_MARKING')).toEqual([
        [INDICATOR_ID, MARKING_ID],
        [INDICATOR_ID, MARKING_ID_2],
      ]);
      expect(endpoints('CREATED_BY')).toEqual([[INDICATOR_ID, IDENTITY_ID]]);
      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('creates no edges for absent references', async () => {
      await ingest([makeIdentity(), makeIndicator()]);

      expect(store.edges()).toEqual([]);
    });

    it('links a report to every object it refers to', async () => {
      await ingest([makeIndicator(), makeMalware(), makeReport()]);

      expect(endpoints('REFERS_TO')).toEqual([
        [REPORT_ID, INDICATOR_ID],
        [REPORT_ID, MALWARE_ID],
      ]);
    });

    it('skips an unresolved reference and still creates its siblings', async () => {
      await ingest([makeIndicator(), makeReport({ object_refs: ['tool--00000000-0000-4000-8000-000000000000', INDICATOR_ID] })]);

      expect(endpoints('REFERS_TO')).toEqual([[REPORT_ID, INDICATOR_ID]]);
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('two-pass ordering', () => {
    it('creates no edges for objects whose nodes were never created', async () => {
      const objects: StixObject[] = [
        makeMarking(),
        makeIndicator({ object_marking_refs: [MARKING_ID] }),
        makeMalware(),
        makeRelationship(),
      ];

      for (const obj of objects) {
        await relationsMaker.createRelations(obj, context);
      }

      expect(store.edges()).toEqual([]);
      expect(errorSpy).not.toHaveBeenCalled();
      expect(debugSpy).toHaveBeenCalledWith(
        `skipping relations of ${RELATIONSHIP_ID}: node not created in this run`,
      );
    });
  });

  describe('duplicate objects', () => {
    it('creates the edges of a repeated id only once within a run', async () => {
      await ingest([
        makeMarking(),
        makeIndicator({ object_marking_refs: [MARKING_ID] }),
        makeIndicator({ object_marking_refs: [MARKING_ID], modified: T1 }),
        makeMalware(),
        makeRelationship(),
        makeRelationship(),
      ]);

      expect(store.nodes('indicator')).toHaveLength(1);
      expect(store.nodes('relationship')).toHaveLength(1);
      expect(endpoints('HAS_MARKING')).toEqual([[INDICATOR_ID, MARKING_ID]]);
      expect(endpoints('indicates')).toEqual([[INDICATOR_ID, MALWARE_ID]]);
    });

    it('adds no edges when the same objects are loaded again into the store', async () => {
      const objects: StixObject[] = [
        makeMarking(),
        makeIndicator({ object_marking_refs: [MARKING_ID] }),
        makeMalware(),
        makeRelationship(),
      ];
      await ingest(objects);

      context = createMappingContext(store);
      await ingest(objects);

      expect(store.nodes()).toHaveLength(4);
      expect(endpoints('HAS_MARKING')).toEqual([[INDICATOR_ID, MARKING_ID]]);
      expect(endpoints('indicates')).toEqual([[INDICATOR_ID, MALWARE_ID]]);
    });
  });

  describe('relationship', () => {
    it('creates a labelled edge from source to target carrying the relationship fields', async () => {
      await ingest([makeIndicator(), makeMalware(), makeRelationship({ description: 'Detects the dropper' })]);

      expect(store.edgesBetweenIds('indicates')).toEqual([
        {
          label: 'indicates',
          from: INDICATOR_ID,
          to: MALWARE_ID,
          properties: {
            id: RELATIONSHIP_ID,
            type: 'relationship',
            created: T0,
            modified: T1,
            revoked: false,
            labels: [],
            external_references: [],
            object_marking_refs: [],
            granular_markings: [],
            created_by_ref: '',
            custom: '',
            source_ref: INDICATOR_ID,
            target_ref: MALWARE_ID,
            relationship_type: 'indicates',
            description: 'Detects the dropper',
          },
        },
      ]);
    });

    it('sanitizes the relationship type into the edge label', async () => {
      await ingest([makeIndicator(), makeMalware(), makeRelationship({ relationship_type: 'related-to' })]);

      expect(endpoints('related_to')).toEqual([[INDICATOR_ID, MALWARE_ID]]);
      expect(store.edges('related_to')[0].properties.relationship_type).toBe('related-to');
    });

    it('adds marking, creator and satellite edges from the relationship node', async () => {
      await ingest([
        makeMarking(),
        makeIdentity(),
        makeIndicator(),
        makeMalware(),
        makeRelationship({
          object_marking_refs: [MARKING_ID],
          created_by_ref: IDENTITY_ID,
          external_references: [{ source_name: 'acme-feed' }],
        }),
      ]);

      const refId = satelliteId('external-reference', RELATIONSHIP_ID, 'external_references', 0);
      expect(endpoints('HAS_MARKING')).toEqual([[RELATIONSHIP_ID, MARKING_ID]]);
      expect(endpoints('CREATED_BY')).toEqual([[RELATIONSHIP_ID, IDENTITY_ID]]);
      expect(endpoints('HAS_EXTERNAL_REF')).toEqual([[RELATIONSHIP_ID, refId]]);
      expect(store.edges('indicates')[0].properties.external_references).toEqual([refId]);
    });

    it('stops after a failed base edge', async () => {
      await ingest([
        makeMarking(),
        makeIndicator(),
        makeRelationship({ object_marking_refs: [MARKING_ID], external_references: [{ source_name: 'acme-feed' }] }),
      ]);

      expect(store.edges()).toEqual([]);
      expect(store.nodes('ExternalReference')).toEqual([]);
      expect(errorSpy).toHaveBeenCalledWith(
        `could not process relation: ${RELATIONSHIP_ID} from: ${INDICATOR_ID} to: ${MALWARE_ID}`,
      );
    });
  });

  describe('sighting', () => {
    beforeEach(async () => {
      await ingest([makeIdentity(), makeIndicator(), makeObservedData(), makeSighting()]);
    });

    it('links the observed data from the sighting node', () => {
      expect(endpoints('SIGHTED_OBSERVED_DATA')).toEqual([[SIGHTING_ID, OBSERVED_DATA_ID]]);
    });

    it('links the sighting location from the sighted object, not the sighting', () => {
      expect(endpoints('WAS_SIGHTED_BY')).toEqual([[INDICATOR_ID, IDENTITY_ID]]);
    });

    it('keeps the base edge as a self-loop on the sighted object', () => {
      const [base] = store.edgesBetweenIds('sighting_of');

      expect(base.from).toBe(INDICATOR_ID);
      expect(base.to).toBe(INDICATOR_ID);
      expect(base.properties).toMatchObject({
        id: SIGHTING_ID,
        sighting_of_ref: INDICATOR_ID,
        count: 0,
        summary: false,
        first_seen: '',
        observed_data_id: [OBSERVED_DATA_ID],
        where_sighted_refs_id: [IDENTITY_ID],
      });
    });

    it('creates no other edges', () => {
      expect(store.edges().map((e) => e.label).sort()).toEqual([
        'SIGHTED_OBSERVED_DATA',
        'WAS_SIGHTED_BY',
        'sighting_of',
      ]);
    });
  });

  describe('auxiliary objects', () => {
    it('links language content to the object it translates', async () => {
      await ingest([makeIndicator(), makeLanguageContent()]);

      expect(store.edgesBetweenIds('language_content')).toEqual([
        { label: 'language_content', from: LANGUAGE_CONTENT_ID, to: INDICATOR_ID, properties: { object_modified: T0 } },
      ]);
    });

    it('gives marking definitions their creator edge', async () => {
      await ingest([makeIdentity(), makeMarking({ created_by_ref: IDENTITY_ID })]);

      expect(endpoints('CREATED_BY')).toEqual([[MARKING_ID, IDENTITY_ID]]);
    });
  });
});
