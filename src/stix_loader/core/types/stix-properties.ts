import {
  CoreProperties,
  DomainObjectByType,
  DomainObjectType,
  LanguageContent,
  MarkingDefinition,
  Relationship,
  Sighting,
} from './stix-types';

/**
 * How a STIX property is validated and how it lands on a graph node.
 *
 * Embedded collections (`external-references`, `granular-markings`,
 * `kill-chain-phases`, `observables`) become satellite nodes; the owner keeps
 * only the satellite ids.
 */
export type PropertyKind =
  | 'string'
  | 'timestamp'
  | 'identifier'
  | 'string-list'
  | 'identifier-list'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'json'
  | 'external-references'
  | 'granular-markings'
  | 'kill-chain-phases'
  | 'observables';

export type EmbeddedKind = Extract<
  PropertyKind,
  'external-references' | 'granular-markings' | 'kill-chain-phases' | 'observables'
>;

export interface PropertySpec {
  readonly name: string;
  readonly kind: PropertyKind;
  readonly required?: boolean;
}

type PropertiesOf<T> = ReadonlyArray<PropertySpec & { readonly name: Extract<keyof T, string> }>;

export function isEmbeddedKind(kind: PropertyKind): kind is EmbeddedKind {
  return (
    kind === 'external-references' ||
    kind === 'granular-markings' ||
    kind === 'kill-chain-phases' ||
    kind === 'observables'
  );
}

export const CORE_PROPERTIES: PropertiesOf<CoreProperties> = [
  { name: 'type', kind: 'string', required: true },
  { name: 'id', kind: 'identifier', required: true },
  { name: 'spec_version', kind: 'string' },
  { name: 'created', kind: 'timestamp', required: true },
  { name: 'modified', kind: 'timestamp', required: true },
  { name: 'created_by_ref', kind: 'identifier' },
  { name: 'revoked', kind: 'boolean' },
  { name: 'labels', kind: 'string-list' },
  { name: 'confidence', kind: 'integer' },
  { name: 'lang', kind: 'string' },
  { name: 'external_references', kind: 'external-references' },
  { name: 'object_marking_refs', kind: 'identifier-list' },
  { name: 'granular_markings', kind: 'granular-markings' },
  { name: 'extensions', kind: 'json' },
];

export const DOMAIN_OBJECT_PROPERTIES: { readonly [K in DomainObjectType]: PropertiesOf<DomainObjectByType[K]> } = {
  'attack-pattern': [
    { name: 'name', kind: 'string', required: true },
    { name: 'description', kind: 'string' },
    { name: 'aliases', kind: 'string-list' },
    { name: 'kill_chain_phases', kind: 'kill-chain-phases' },
  ],
  campaign: [
    { name: 'name', kind: 'string', required: true },
    { name: 'description', kind: 'string' },
    { name: 'aliases', kind: 'string-list' },
    { name: 'first_seen', kind: 'timestamp' },
    { name: 'last_seen', kind: 'timestamp' },
    { name: 'objective', kind: 'string' },
  ],
  'course-of-action': [
    { name: 'name', kind: 'string', required: true },
    { name: 'description', kind: 'string' },
  ],
  grouping: [
    { name: 'name', kind: 'string' },
    { name: 'description', kind: 'string' },
    { name: 'context', kind: 'string', required: true },
    { name: 'object_refs', kind: 'identifier-list', required: true },
  ],
  identity: [
    { name: 'name', kind: 'string', required: true },
    { name: 'description', kind: 'string' },
    { name: 'roles', kind: 'string-list' },
    { name: 'identity_class', kind: 'string' },
    { name: 'sectors', kind: 'string-list' },
    { name: 'contact_information', kind: 'string' },
  ],
  incident: [
    { name: 'name', kind: 'string', required: true },
    { name: 'description', kind: 'string' },
    { name: 'kill_chain_phases', kind: 'kill-chain-phases' },
  ],
  indicator: [
    { name: 'name', kind: 'string' },
    { name: 'description', kind: 'string' },
    { name: 'indicator_types', kind: 'string-list' },
    { name: 'pattern', kind: 'string', required: true },
    { name: 'pattern_type', kind: 'string' },
    { name: 'pattern_version', kind: 'string' },
    { name: 'valid_from', kind: 'timestamp', required: true },
    { name: 'valid_until', kind: 'timestamp' },
    { name: 'kill_chain_phases', kind: 'kill-chain-phases' },
  ],
  infrastructure: [
    { name: 'name', kind: 'string', required: true },
    { name: 'description', kind: 'string' },
    { name: 'infrastructure_types', kind: 'string-list' },
    { name: 'aliases', kind: 'string-list' },
    { name: 'kill_chain_phases', kind: 'kill-chain-phases' },
    { name: 'first_seen', kind: 'timestamp' },
    { name: 'last_seen', kind: 'timestamp' },
  ],
  'intrusion-set': [
    { name: 'name', kind: 'string', required: true },
    { name: 'description', kind: 'string' },
    { name: 'aliases', kind: 'string-list' },
    { name: 'first_seen', kind: 'timestamp' },
    { name: 'last_seen', kind: 'timestamp' },
    { name: 'goals', kind: 'string-list' },
    { name: 'resource_level', kind: 'string' },
    { name: 'primary_motivation', kind: 'string' },
    { name: 'secondary_motivations', kind: 'string-list' },
  ],
  location: [
    { name: 'name', kind: 'string' },
    { name: 'description', kind: 'string' },
    { name: 'latitude', kind: 'number' },
    { name: 'longitude', kind: 'number' },
    { name: 'precision', kind: 'number' },
    { name: 'region', kind: 'string' },
    { name: 'country', kind: 'string' },
    { name: 'administrative_area', kind: 'string' },
    { name: 'city', kind: 'string' },
    { name: 'street_address', kind: 'string' },
    { name: 'postal_code', kind: 'string' },
  ],
  malware: [
    { name: 'name', kind: 'string' },
    { name: 'description', kind: 'string' },
    { name: 'malware_types', kind: 'string-list' },
    { name: 'is_family', kind: 'boolean' },
    { name: 'aliases', kind: 'string-list' },
    { name: 'kill_chain_phases', kind: 'kill-chain-phases' },
    { name: 'first_seen', kind: 'timestamp' },
    { name: 'last_seen', kind: 'timestamp' },
    { name: 'operating_system_refs', kind: 'identifier-list' },
    { name: 'architecture_execution_envs', kind: 'string-list' },
    { name: 'implementation_languages', kind: 'string-list' },
    { name: 'capabilities', kind: 'string-list' },
    { name: 'sample_refs', kind: 'identifier-list' },
  ],
  'malware-analysis': [
    { name: 'product', kind: 'string', required: true },
    { name: 'version', kind: 'string' },
    { name: 'host_vm_ref', kind: 'identifier' },
    { name: 'operating_system_ref', kind: 'identifier' },
    { name: 'installed_software_refs', kind: 'identifier-list' },
    { name: 'configuration_version', kind: 'string' },
    { name: 'modules', kind: 'string-list' },
    { name: 'analysis_engine_version', kind: 'string' },
    { name: 'analysis_definition_version', kind: 'string' },
    { name: 'submitted', kind: 'timestamp' },
    { name: 'analysis_started', kind: 'timestamp' },
    { name: 'analysis_ended', kind: 'timestamp' },
    { name: 'result_name', kind: 'string' },
    { name: 'result', kind: 'string' },
    { name: 'analysis_sco_refs', kind: 'identifier-list' },
    { name: 'sample_ref', kind: 'identifier' },
  ],
  note: [
    { name: 'abstract', kind: 'string' },
    { name: 'content', kind: 'string', required: true },
    { name: 'authors', kind: 'string-list' },
    { name: 'object_refs', kind: 'identifier-list', required: true },
  ],
  'observed-data': [
    { name: 'first_observed', kind: 'timestamp', required: true },
    { name: 'last_observed', kind: 'timestamp', required: true },
    { name: 'number_observed', kind: 'integer', required: true },
    { name: 'objects', kind: 'observables' },
    { name: 'object_refs', kind: 'identifier-list' },
  ],
  opinion: [
    { name: 'explanation', kind: 'string' },
    { name: 'authors', kind: 'string-list' },
    { name: 'opinion', kind: 'string', required: true },
    { name: 'object_refs', kind: 'identifier-list', required: true },
  ],
  report: [
    { name: 'name', kind: 'string', required: true },
    { name: 'description', kind: 'string' },
    { name: 'report_types', kind: 'string-list' },
    { name: 'published', kind: 'timestamp', required: true },
    { name: 'object_refs', kind: 'identifier-list', required: true },
  ],
  'threat-actor': [
    { name: 'name', kind: 'string', required: true },
    { name: 'description', kind: 'string' },
    { name: 'threat_actor_types', kind: 'string-list' },
    { name: 'aliases', kind: 'string-list' },
    { name: 'first_seen', kind: 'timestamp' },
    { name: 'last_seen', kind: 'timestamp' },
    { name: 'roles', kind: 'string-list' },
    { name: 'goals', kind: 'string-list' },
    { name: 'sophistication', kind: 'string' },
    { name: 'resource_level', kind: 'string' },
    { name: 'primary_motivation', kind: 'string' },
    { name: 'secondary_motivations', kind: 'string-list' },
    { name: 'personal_motivations', kind: 'string-list' },
  ],
  tool: [
    { name: 'name', kind: 'string', required: true },
    { name: 'description', kind: 'string' },
    { name: 'tool_types', kind: 'string-list' },
    { name: 'aliases', kind: 'string-list' },
    { name: 'kill_chain_phases', kind: 'kill-chain-phases' },
    { name: 'tool_version', kind: 'string' },
  ],
  vulnerability: [
    { name: 'name', kind: 'string', required: true },
    { name: 'description', kind: 'string' },
  ],
};

export const RELATIONSHIP_PROPERTIES: PropertiesOf<Relationship> = [
  { name: 'relationship_type', kind: 'string', required: true },
  { name: 'description', kind: 'string' },
  { name: 'source_ref', kind: 'identifier', required: true },
  { name: 'target_ref', kind: 'identifier', required: true },
  { name: 'start_time', kind: 'timestamp' },
  { name: 'stop_time', kind: 'timestamp' },
];

export const SIGHTING_PROPERTIES: PropertiesOf<Sighting> = [
  { name: 'first_seen', kind: 'timestamp' },
  { name: 'last_seen', kind: 'timestamp' },
  { name: 'count', kind: 'integer' },
  { name: 'sighting_of_ref', kind: 'identifier', required: true },
  { name: 'observed_data_refs', kind: 'identifier-list' },
  { name: 'where_sighted_refs', kind: 'identifier-list' },
  { name: 'summary', kind: 'boolean' },
  { name: 'description', kind: 'string' },
  { name: 'detected', kind: 'boolean' },
];

// marking-definition does not carry the full common property set
export const MARKING_DEFINITION_PROPERTIES: PropertiesOf<MarkingDefinition> = [
  { name: 'type', kind: 'string', required: true },
  { name: 'id', kind: 'identifier', required: true },
  { name: 'spec_version', kind: 'string' },
  { name: 'created', kind: 'timestamp', required: true },
  { name: 'created_by_ref', kind: 'identifier' },
  { name: 'external_references', kind: 'external-references' },
  { name: 'object_marking_refs', kind: 'identifier-list' },
  { name: 'granular_markings', kind: 'granular-markings' },
  { name: 'name', kind: 'string' },
  { name: 'definition_type', kind: 'string' },
  { name: 'definition', kind: 'json' },
];

export const LANGUAGE_CONTENT_PROPERTIES: PropertiesOf<LanguageContent> = [
  { name: 'object_ref', kind: 'identifier', required: true },
  { name: 'object_modified', kind: 'timestamp', required: true },
  { name: 'contents', kind: 'json', required: true },
];

/**
 * Full property list of a STIX type, or undefined when the type is not part
 * of the supported taxonomy. Custom (`x-`) objects only know the core set.
 */
export function propertiesFor(type: string): ReadonlyArray<PropertySpec> | undefined {
  switch (type) {
    case 'relationship':
      return [...CORE_PROPERTIES, ...RELATIONSHIP_PROPERTIES];
    case 'sighting':
      return [...CORE_PROPERTIES, ...SIGHTING_PROPERTIES];
    case 'marking-definition':
      return MARKING_DEFINITION_PROPERTIES;
    case 'language-content':
      return [...CORE_PROPERTIES, ...LANGUAGE_CONTENT_PROPERTIES];
  }
  if (type.startsWith('x-')) {
    return CORE_PROPERTIES;
  }
  if (isDomainObjectType(type)) {
    return [...CORE_PROPERTIES, ...DOMAIN_OBJECT_PROPERTIES[type]];
  }
  return undefined;
}

export function isDomainObjectType(type: string): type is DomainObjectType {
  return Object.prototype.hasOwnProperty.call(DOMAIN_OBJECT_PROPERTIES, type);
}

const ALL_PROPERTY_SPECS: ReadonlyArray<PropertySpec> = [
  ...CORE_PROPERTIES,
  ...RELATIONSHIP_PROPERTIES,
  ...SIGHTING_PROPERTIES,
  ...MARKING_DEFINITION_PROPERTIES,
  ...LANGUAGE_CONTENT_PROPERTIES,
  ...Object.values(DOMAIN_OBJECT_PROPERTIES).flatMap((specs: ReadonlyArray<PropertySpec>) => [...specs]),
];

// names that never hold a fraction; graph drivers must not store them as floats
export const INTEGER_PROPERTY_NAMES: ReadonlySet<string> = new Set(
  ALL_PROPERTY_SPECS.filter((spec) => spec.kind === 'integer').map((spec) => spec.name),
);
