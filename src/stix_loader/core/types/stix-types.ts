// Basic Types
export type Identifier = string; // STIX identifier pattern: [object-type]--[UUID]
export type Timestamp = string; // RFC 3339, e.g. 2017-01-20T00:00:00.000Z
export type Dictionary = Record<string, unknown>;

// Embedded sub-objects

export type ExternalReference = {
  source_name: string;
  description?: string;
  url?: string;
  hashes?: Record<string, string>;
  external_id?: string;
};

export type GranularMarking = {
  selectors: string[];
  marking_ref?: Identifier;
  lang?: string;
};

export type KillChainPhase = {
  kill_chain_name: string;
  phase_name: string;
};

export type CyberObservable = {
  type: string;
  [key: string]: unknown;
};

// Common properties of domain and relationship objects
export type CoreProperties = {
  type: string;
  id: Identifier;
  spec_version?: string;
  created: Timestamp;
  modified: Timestamp;
  created_by_ref?: Identifier;
  revoked?: boolean;
  labels?: string[];
  confidence?: number;
  lang?: string;
  external_references?: ExternalReference[];
  object_marking_refs?: Identifier[];
  granular_markings?: GranularMarking[];
  extensions?: Dictionary;
};

// Domain objects

export type AttackPattern = CoreProperties & {
  type: 'attack-pattern';
  name: string;
  description?: string;
  aliases?: string[];
  kill_chain_phases?: KillChainPhase[];
};

export type Campaign = CoreProperties & {
  type: 'campaign';
  name: string;
  description?: string;
  aliases?: string[];
  first_seen?: Timestamp;
  last_seen?: Timestamp;
  objective?: string;
};

export type CourseOfAction = CoreProperties & {
  type: 'course-of-action';
  name: string;
  description?: string;
};

export type Grouping = CoreProperties & {
  type: 'grouping';
  name?: string;
  description?: string;
  context: string;
  object_refs: Identifier[];
};

export type Identity = CoreProperties & {
  type: 'identity';
  name: string;
  description?: string;
  roles?: string[];
  identity_class?: string;
  sectors?: string[];
  contact_information?: string;
};

export type Incident = CoreProperties & {
  type: 'incident';
  name: string;
  description?: string;
  kill_chain_phases?: KillChainPhase[];
};

export type Indicator = CoreProperties & {
  type: 'indicator';
  name?: string;
  description?: string;
  indicator_types?: string[];
  pattern: string;
  pattern_type?: string;
  pattern_version?: string;
  valid_from: Timestamp;
  valid_until?: Timestamp;
  kill_chain_phases?: KillChainPhase[];
};

export type Infrastructure = CoreProperties & {
  type: 'infrastructure';
  name: string;
  description?: string;
  infrastructure_types?: string[];
  aliases?: string[];
  kill_chain_phases?: KillChainPhase[];
  first_seen?: Timestamp;
  last_seen?: Timestamp;
};

export type IntrusionSet = CoreProperties & {
  type: 'intrusion-set';
  name: string;
  description?: string;
  aliases?: string[];
  first_seen?: Timestamp;
  last_seen?: Timestamp;
  goals?: string[];
  resource_level?: string;
  primary_motivation?: string;
  secondary_motivations?: string[];
};

export type Location = CoreProperties & {
  type: 'location';
  name?: string;
  description?: string;
  latitude?: number;
  longitude?: number;
  precision?: number;
  region?: string;
  country?: string;
  administrative_area?: string;
  city?: string;
  street_address?: string;
  postal_code?: string;
};

export type Malware = CoreProperties & {
  type: 'malware';
  name?: string;
  description?: string;
  malware_types?: string[];
  is_family?: boolean;
  aliases?: string[];
  kill_chain_phases?: KillChainPhase[];
  first_seen?: Timestamp;
  last_seen?: Timestamp;
  operating_system_refs?: Identifier[];
  architecture_execution_envs?: string[];
  implementation_languages?: string[];
  capabilities?: string[];
  sample_refs?: Identifier[];
};

export type MalwareAnalysis = CoreProperties & {
  type: 'malware-analysis';
  product: string;
  version?: string;
  host_vm_ref?: Identifier;
  operating_system_ref?: Identifier;
  installed_software_refs?: Identifier[];
  configuration_version?: string;
  modules?: string[];
  analysis_engine_version?: string;
  analysis_definition_version?: string;
  submitted?: Timestamp;
  analysis_started?: Timestamp;
  analysis_ended?: Timestamp;
  result_name?: string;
  result?: string;
  analysis_sco_refs?: Identifier[];
  sample_ref?: Identifier;
};

export type Note = CoreProperties & {
  type: 'note';
  abstract?: string;
  content: string;
  authors?: string[];
  object_refs: Identifier[];
};

export type ObservedData = CoreProperties & {
  type: 'observed-data';
  first_observed: Timestamp;
  last_observed: Timestamp;
  number_observed: number;
  objects?: Record<string, CyberObservable>;
  object_refs?: Identifier[];
};

export type Opinion = CoreProperties & {
  type: 'opinion';
  explanation?: string;
  authors?: string[];
  opinion: string;
  object_refs: Identifier[];
};

export type Report = CoreProperties & {
  type: 'report';
  name: string;
  description?: string;
  report_types?: string[];
  published: Timestamp;
  object_refs: Identifier[];
};

export type ThreatActor = CoreProperties & {
  type: 'threat-actor';
  name: string;
  description?: string;
  threat_actor_types?: string[];
  aliases?: string[];
  first_seen?: Timestamp;
  last_seen?: Timestamp;
  roles?: string[];
  goals?: string[];
  sophistication?: string;
  resource_level?: string;
  primary_motivation?: string;
  secondary_motivations?: string[];
  personal_motivations?: string[];
};

export type Tool = CoreProperties & {
  type: 'tool';
  name: string;
  description?: string;
  tool_types?: string[];
  aliases?: string[];
  kill_chain_phases?: KillChainPhase[];
  tool_version?: string;
};

export type Vulnerability = CoreProperties & {
  type: 'vulnerability';
  name: string;
  description?: string;
};

/** Any `x-` prefixed object; everything past the common properties is custom. */
export type CustomObject = CoreProperties & {
  type: `x-${string}`;
};

export type DomainObjectByType = {
  'attack-pattern': AttackPattern;
  campaign: Campaign;
  'course-of-action': CourseOfAction;
  grouping: Grouping;
  identity: Identity;
  incident: Incident;
  indicator: Indicator;
  infrastructure: Infrastructure;
  'intrusion-set': IntrusionSet;
  location: Location;
  malware: Malware;
  'malware-analysis': MalwareAnalysis;
  note: Note;
  'observed-data': ObservedData;
  opinion: Opinion;
  report: Report;
  'threat-actor': ThreatActor;
  tool: Tool;
  vulnerability: Vulnerability;
};

export type DomainObjectType = keyof DomainObjectByType;

export type StixDomainObject = DomainObjectByType[DomainObjectType] | CustomObject;

// Relationship objects

export type Relationship = CoreProperties & {
  type: 'relationship';
  relationship_type: string;
  description?: string;
  source_ref: Identifier;
  target_ref: Identifier;
  start_time?: Timestamp;
  stop_time?: Timestamp;
};

export type Sighting = CoreProperties & {
  type: 'sighting';
  first_seen?: Timestamp;
  last_seen?: Timestamp;
  count?: number;
  sighting_of_ref: Identifier;
  observed_data_refs?: Identifier[];
  where_sighted_refs?: Identifier[];
  summary?: boolean;
  description?: string;
  detected?: boolean;
};

export type StixRelationshipObject = Relationship | Sighting;

// Auxiliary objects

export type MarkingDefinition = {
  type: 'marking-definition';
  id: Identifier;
  spec_version?: string;
  created: Timestamp;
  created_by_ref?: Identifier;
  external_references?: ExternalReference[];
  object_marking_refs?: Identifier[];
  granular_markings?: GranularMarking[];
  name?: string;
  definition_type?: string;
  definition?: Dictionary;
};

export type LanguageContent = CoreProperties & {
  type: 'language-content';
  object_ref: Identifier;
  object_modified: Timestamp;
  contents: Dictionary;
};

export type StixAuxiliaryObject = MarkingDefinition | LanguageContent;

export type StixObject = StixDomainObject | StixRelationshipObject | StixAuxiliaryObject;

