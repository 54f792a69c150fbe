/**
 * Topology description for `inspect`: resolved ports, mounts, health checks and tiers.
 */

import type { ComposeProject, ServiceDefinition } from '../domain/types/compose.js';
import { startupTiers } from './dependency-graph.js';
import { formatDuration } from './duration.js';
import { describeTest, readinessWindowMs, resolveHealthCheck } from './healthcheck.js';
import { referencedVariables } from './interpolation.js';
import { formatPortMapping, parsePortMapping } from './ports.js';
import { parseVolumeMount } from './volumes.js';

export interface HealthCheckDescription {
  command: string;
  interval: string;
  timeout: string;
  retries: number;
  startPeriod: string;
  readinessWindow: string;
  disabled: boolean;
}

export interface ServiceDescription {
  name: string;
  source: string;
  containerName?: string;
  restart?: string;
  ports: string[];
  networks: string[];
  volumes: string[];
  envFiles: string[];
  healthcheck?: HealthCheckDescription;
  dependsOn: Array<{ service: string; condition: string }>;
}

export interface ProjectDescription {
  name?: string;
  services: ServiceDescription[];
  volumes: string[];
  networks: string[];
  /** Variables still referenced in the document (before interpolation) */
  variables: string[];
  /** Undefined when the dependency graph has a cycle */
  startupTiers?: string[][];
}

function describeSource(service: ServiceDefinition): string {
  if (service.image !== undefined) return `image ${service.image}`;
  if (service.build !== undefined) {
    return service.build.dockerfile !== undefined
      ? `build ${service.build.context} (${service.build.dockerfile})`
      : `build ${service.build.context}`;
  }
  return '(none)';
}

function describeService(service: ServiceDefinition): ServiceDescription {
  const ports = service.ports.map((entry) => {
    const mapping = parsePortMapping(entry);
    return mapping.ok ? formatPortMapping(mapping.value) : `invalid: ${mapping.error}`;
  });

  const volumes = service.volumes.map((entry) => {
    const mount = parseVolumeMount(entry);
    if (!mount.ok) return `invalid: ${mount.error}`;
    const { type, source, target, readOnly } = mount.value;
    return `${type} ${source ?? '(anonymous)'} -> ${target}${readOnly ? ' (ro)' : ''}`;
  });

  let healthcheck: HealthCheckDescription | undefined;
  if (service.healthcheck) {
    const resolved = resolveHealthCheck(service.healthcheck);
    if (resolved.ok) {
      const check = resolved.value;
      healthcheck = {
        command: describeTest(check),
        interval: formatDuration(check.intervalMs),
        timeout: formatDuration(check.timeoutMs),
        retries: check.retries,
        startPeriod: formatDuration(check.startPeriodMs),
        readinessWindow: formatDuration(readinessWindowMs(check)),
        disabled: check.disabled,
      };
    }
  }

  return {
    name: service.name,
    source: describeSource(service),
    ...(service.containerName !== undefined ? { containerName: service.containerName } : {}),
    ...(service.restart !== undefined ? { restart: service.restart } : {}),
    ports,
    networks: service.networks,
    volumes,
    envFiles: service.envFiles.map((entry) => entry.path),
    ...(healthcheck ? { healthcheck } : {}),
    dependsOn: service.dependsOn.map(({ service: dependency, condition }) => ({ service: dependency, condition })),
  };
}

function collectStrings(value: unknown, out: string[]): void {
  if (typeof value === 'string') out.push(value);
  else if (Array.isArray(value)) value.forEach((item) => collectStrings(item, out));
  else if (value !== null && typeof value === 'object') {
    Object.values(value).forEach((item) => collectStrings(item, out));
  }
}

/**
 * Variables a loaded (not yet interpolated) document references, sorted
 */
export function collectVariables(raw: Record<string, unknown>): string[] {
  const strings: string[] = [];
  collectStrings(raw, strings);
  return [...new Set(strings.flatMap(referencedVariables))].sort();
}

export function describeProject(project: ComposeProject, raw: Record<string, unknown> = {}): ProjectDescription {
  const tiers = startupTiers(project);

  return {
    ...(project.name !== undefined ? { name: project.name } : {}),
    services: project.services.map(describeService),
    volumes: project.volumes.map((volume) => volume.name),
    networks: project.networks.map((network) => network.name),
    variables: collectVariables(raw),
    ...(tiers.ok ? { startupTiers: tiers.value } : {}),
  };
}
