import { Logger } from '@nestjs/common';
import {
  MakerSupportService,
  asCleanLabel,
  asJsonString,
  asNodeProperties,
  satelliteId,
  toGraphValue,
} from './maker-support.service';
import { createMappingContext, MappingContext } from './mapping-context';
import { InMemoryGraphStore } from '../graph-store/in-memory-graph-store';
import { StixParserService } from '../stix-parser/stix-parser.service';
import { GraphProperties } from '../graph-store/graph-store.interface';
import {
  IDENTITY_ID,
  INDICATOR_ID,
  MARKING_ID,
  T0,
  makeIdentity,
  makeIndicator,
  makeMarking,
} from '../../testing/stix-fixtures';

function customOf(properties: GraphProperties): unknown {
  const custom = properties.custom;
  return typeof custom === 'string' && custom.length > 0 ? JSON.parse(custom) : undefined;
}

describe('asCleanLabel', () => {
  it.each([
    ['attack-pattern', 'attack_pattern'],
    ['indicates', 'indicates'],
    ['x-acme.widget', 'x_acme_widget'],
    ['3d-printer', '_3d_printer'],
    ['', 'UNKNOWN'],
  ])('turns %p into %p', (input, expected) => {
    expect(asCleanLabel(input)).toBe(expected);
  });
});

describe('toGraphValue', () => {
  it('keeps scalars and homogeneous arrays', () => {
    expect(toGraphValue('a')).toBe('a');
    expect(toGraphValue(4)).toBe(4);
    expect(toGraphValue([1, 2])).toEqual([1, 2]);
    expect(toGraphValue(['a', 'b'])).toEqual(['a', 'b']);
  });

  it('serializes nested and mixed values', () => {
    expect(toGraphValue({ 'SHA-256': 'abc' })).toBe('{"SHA-256":"abc"}');
    expect(toGraphValue([1, 'a'])).toBe('[1,"a"]');
    expect(toGraphValue(null)).toBeUndefined();
  });
});

describe('asNodeProperties', () => {
  const parser = new StixParserService();

  it('produces identical property bags for the same object', () => {
    const indicator = makeIndicator({
      labels: ['malicious-activity'],
      external_references: [{ source_name: 'acme-feed', external_id: 'AF-1' }],
      object_marking_refs: [MARKING_ID],
    });

    const first = asNodeProperties(indicator);
    const second = asNodeProperties(parser.parseObject(JSON.stringify(indicator)));

    expect(JSON.stringify(first)).toBe(JSON.stringify(second));
  });

  it('fills absent properties with their empty value', () => {
    const properties = asNodeProperties(makeIndicator());

    expect(properties.description).toBe('');
    expect(properties.created_by_ref).toBe('');
    expect(properties.labels).toEqual([]);
    expect(properties.revoked).toBe(false);
    expect(properties.external_references).toEqual([]);
    expect(properties.extensions).toBe('');
    expect(properties.custom).toBe('');
    expect('confidence' in properties).toBe(false);
  });

  it('stores satellite ids for embedded collections', () => {
    const properties = asNodeProperties(
      makeIndicator({
        external_references: [{ source_name: 'acme-feed' }, { source_name: 'other-feed' }],
        kill_chain_phases: [{ kill_chain_name: 'lockheed-martin-cyber-kill-chain', phase_name: 'delivery' }],
      }),
    );

    expect(properties.external_references).toEqual([
      satelliteId('external-reference', INDICATOR_ID, 'external_references', 0),
      satelliteId('external-reference', INDICATOR_ID, 'external_references', 1),
    ]);
    expect(properties.kill_chain_phases).toEqual([
      satelliteId('kill-chain-phase', INDICATOR_ID, 'kill_chain_phases', 0),
    ]);
  });

  it('serializes JSON-valued properties', () => {
    const properties = asNodeProperties(makeMarking());

    expect(properties.definition).toBe('{"statement":"Internal distribution only"}');
    expect('modified' in properties).toBe(false);
  });

  it('keeps unrecognized fields in custom', () => {
    const obj = parser.parseValue({ ...makeIndicator(), foo: 'bar' });

    expect(customOf(asNodeProperties(obj))).toEqual({ foo: 'bar' });
  });

  it('treats everything past the common properties of a custom object as custom', () => {
    const obj = parser.parseValue({
      type: 'x-acme-widget',
      id: 'x-acme-widget--5a0b3c1d-1111-4222-8333-444455556666',
      created: T0,
      modified: T0,
      colour: 'blue',
      parts: { count: 2 },
    });

    const properties = asNodeProperties(obj);

    expect(properties.type).toBe('x-acme-widget');
    expect(customOf(properties)).toEqual({ colour: 'blue', parts: { count: 2 } });
  });
});

describe('asJsonString', () => {
  it('is empty for no custom fields', () => {
    expect(asJsonString({})).toBe('');
    expect(asJsonString({ a: 1 })).toBe('{"a":1}');
  });
});

describe('satelliteId', () => {
  it('is stable for the same owner, field and position', () => {
    const id = satelliteId('external-reference', INDICATOR_ID, 'external_references', 0);

    expect(id).toBe(satelliteId('external-reference', INDICATOR_ID, 'external_references', 0));
    expect(id).not.toBe(satelliteId('external-reference', INDICATOR_ID, 'external_references', 1));
    expect(id).toMatch(/^external-reference--[0-9a-f-]{36}$/);
  });
});

describe('MakerSupportService', () => {
  let store: InMemoryGraphStore;
  let context: MappingContext;
  let support: MakerSupportService;
  let errorSpy: jest.SpyInstance;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    store = new InMemoryGraphStore();
    await store.open('memory://test');
    context = createMappingContext(store);
    support = new MakerSupportService();
    await store.transaction(async (tx) => {
      context.index.register(IDENTITY_ID, await tx.createNode('identity', asNodeProperties(makeIdentity())));
      context.index.register(INDICATOR_ID, await tx.createNode('indicator', asNodeProperties(makeIndicator())));
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('creates one edge per resolvable target and skips the rest', async () => {
    const created = await support.createRelToObjRef(
      context,
      INDICATOR_ID,
      [IDENTITY_ID, 'identity--00000000-0000-4000-8000-000000000000'],
      'REFERS_TO',
    );

    expect(created).toBe(1);
    expect(store.edgesBetweenIds('REFERS_TO')).toEqual([
      { label: 'REFERS_TO', from: INDICATOR_ID, to: IDENTITY_ID, properties: {} },
    ]);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toBe(
      `could not create REFERS_TO edge from ${INDICATOR_ID} to identity--00000000-0000-4000-8000-000000000000: ` +
        'no node found for id identity--00000000-0000-4000-8000-000000000000',
    );
  });

  it('creates no edge for an absent reference list', async () => {
    expect(await support.createRelToObjRef(context, INDICATOR_ID, undefined, 'HAS_MARKING')).toBe(0);
    expect(await support.createdByRel(context, INDICATOR_ID, undefined)).toBe(false);
    expect(store.edges()).toEqual([]);
  });

  it('materializes external references as linked satellites', async () => {
    const ids = await support.createExternRefs(context, INDICATOR_ID, [
      { source_name: 'acme-feed', url: 'https://feed.example/AF-1', hashes: { 'SHA-256': 'abc' } },
    ]);

    const expectedId = satelliteId('external-reference', INDICATOR_ID, 'external_references', 0);
    expect(ids).toEqual([expectedId]);
    expect(store.nodes('ExternalReference').map((n) => n.properties)).toEqual([
      {
        id: expectedId,
        source_name: 'acme-feed',
        description: '',
        url: 'https://feed.example/AF-1',
        external_id: '',
        hashes: '{"SHA-256":"abc"}',
      },
    ]);
    expect(store.edgesBetweenIds('HAS_EXTERNAL_REF')).toEqual([
      { label: 'HAS_EXTERNAL_REF', from: INDICATOR_ID, to: expectedId, properties: {} },
    ]);
  });

  it('materializes granular markings', async () => {
    const ids = await support.createGranulars(context, INDICATOR_ID, [
      { selectors: ['description'], marking_ref: MARKING_ID },
    ]);

    expect(store.nodes('GranularMarking').map((n) => n.properties)).toEqual([
      { id: ids[0], selectors: ['description'], marking_ref: MARKING_ID, lang: '' },
    ]);
    expect(store.edges('HAS_GRANULAR_MARKING')).toHaveLength(1);
  });

  it('does not create satellites for an owner that is not in the graph', async () => {
    const ids = await support.createKillPhases(context, 'tool--00000000-0000-4000-8000-000000000000', [
      { kill_chain_name: 'lockheed-martin-cyber-kill-chain', phase_name: 'delivery' },
    ]);

    expect(ids).toEqual([]);
    expect(store.nodes('KillChainPhase')).toEqual([]);
  });
});
