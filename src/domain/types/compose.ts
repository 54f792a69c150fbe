/**
 * Normalized compose topology model.
 *
 * The file shape (ComposeDocument) lives in compose/schema.ts and is inferred from zod;
 * everything here is the form the validator and inspector work with, after short and
 * long syntaxes have been folded together.
 */

export type Protocol = 'tcp' | 'udp' | 'sctp';

export interface PortRange {
  start: number;
  end: number;
}

export interface PortMapping {
  /** Host interface; undefined binds every interface */
  hostIp?: string;
  /** Host side; undefined when only the container port is exposed */
  published?: PortRange;
  target: PortRange;
  protocol: Protocol;
  raw: string;
}

export interface HostBinding {
  hostIp?: string;
  ports: PortRange;
  protocol: Protocol;
  /** Host range feeding one container port: only one port of the range is taken */
  anyOf: boolean;
}

export type VolumeMountType = 'volume' | 'bind' | 'tmpfs';

export interface VolumeMount {
  type: VolumeMountType;
  source?: string;
  target: string;
  readOnly: boolean;
  raw: string;
}

export interface HealthCheck {
  test: string[];
  intervalMs: number;
  timeoutMs: number;
  retries: number;
  startPeriodMs: number;
  disabled: boolean;
}

export type DependencyCondition =
  | 'service_started'
  | 'service_healthy'
  | 'service_completed_successfully';

export interface ServiceDependency {
  service: string;
  condition: DependencyCondition;
  restart: boolean;
  required: boolean;
}

export type WatchAction = 'rebuild' | 'sync' | 'sync+restart' | 'restart';

export interface WatchRule {
  path: string;
  action: WatchAction;
  target?: string;
  ignore: string[];
}

export interface EnvFileReference {
  path: string;
  /** Optional entries (`required: false`) may be absent */
  required: boolean;
}

export interface BuildSpec {
  context: string;
  dockerfile?: string;
}

export interface ServiceDefinition {
  name: string;
  image?: string;
  build?: BuildSpec;
  containerName?: string;
  restart?: string;
  envFiles: EnvFileReference[];
  environment: Record<string, string | null>;
  /** Raw port entries; parsed lazily so bad entries surface as validation issues */
  ports: Array<string | number | Record<string, unknown>>;
  networks: string[];
  healthcheck?: RawHealthCheck;
  volumes: Array<string | Record<string, unknown>>;
  dependsOn: ServiceDependency[];
  watch: WatchRule[];
}

/** Health check as declared; durations are still text until resolved */
export interface RawHealthCheck {
  test?: string | string[];
  interval?: string | number;
  timeout?: string | number;
  retries?: number;
  startPeriod?: string | number;
  disable?: boolean;
}

export interface ResourceDeclaration {
  name: string;
  driver?: string;
  external: boolean;
  /** Explicit name the orchestrator should use instead of the project-scoped one */
  externalName?: string;
}

export interface ComposeProject {
  name?: string;
  services: ServiceDefinition[];
  volumes: ResourceDeclaration[];
  networks: ResourceDeclaration[];
}

export type IssueSeverity = 'error' | 'warning';

export interface ValidationIssue {
  rule: string;
  severity: IssueSeverity;
  message: string;
  service?: string;
  path: string;
}

export interface ValidationReport {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}
