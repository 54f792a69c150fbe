/**
 * Static topology checks.
 *
 * Each rule inspects the normalized project and returns issues tagged with its rule id.
 * Rules run in a fixed order and report services in declaration order, so output is
 * stable between runs.
 */

import { IMPLICIT_NETWORK, RESTART_POLICIES } from '../config/defaults.js';
import type {
  ComposeProject,
  HostBinding,
  PortMapping,
  ServiceDefinition,
  ValidationIssue,
  ValidationReport,
} from '../domain/types/compose.js';
import { buildDependencyGraph, findCycles, formatCycle } from './dependency-graph.js';
import { resolveHealthCheck } from './healthcheck.js';
import { collidingPort, hostBindingOf, parsePortMapping } from './ports.js';
import { namedVolumeOf, parseVolumeMount } from './volumes.js';

export interface ValidateOptions {
  /** Warnings make the report invalid */
  strict?: boolean;
  /** Issues found before validation (interpolation, filesystem checks) */
  additionalIssues?: ValidationIssue[];
}

export interface Rule {
  id: string;
  description: string;
  check: (project: ComposeProject) => ValidationIssue[];
}

function error(rule: string, message: string, path: string, service?: string): ValidationIssue {
  return { rule, severity: 'error', message, path, ...(service !== undefined ? { service } : {}) };
}

function warning(rule: string, message: string, path: string, service?: string): ValidationIssue {
  return { rule, severity: 'warning', message, path, ...(service !== undefined ? { service } : {}) };
}

function findService(project: ComposeProject, name: string): ServiceDefinition | undefined {
  return project.services.find((service) => service.name === name);
}

function serviceSourceRule(project: ComposeProject): ValidationIssue[] {
  return project.services
    .filter((service) => service.image === undefined && service.build === undefined)
    .map((service) =>
      error(
        'service-source-missing',
        `Service "${service.name}" has neither an image nor a build context`,
        `services.${service.name}`,
        service.name,
      ),
    );
}

function unknownDependencyRule(project: ComposeProject): ValidationIssue[] {
  return buildDependencyGraph(project).unknown.map(({ service, dependency }) =>
    error(
      'dependency-unknown-service',
      `Service "${service}" depends on undeclared service "${dependency}"`,
      `services.${service}.depends_on.${dependency}`,
      service,
    ),
  );
}

function dependencyHealthcheckRule(project: ComposeProject): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const service of project.services) {
    for (const dependency of service.dependsOn) {
      if (dependency.condition !== 'service_healthy') continue;

      const target = findService(project, dependency.service);
      if (!target) continue;

      const path = `services.${service.name}.depends_on.${dependency.service}.condition`;

      if (!target.healthcheck) {
        issues.push(
          error(
            'dependency-healthcheck-missing',
            `"${service.name}" waits for "${target.name}" to be healthy but "${target.name}" defines no health check`,
            path,
            service.name,
          ),
        );
        continue;
      }

      const resolved = resolveHealthCheck(target.healthcheck);
      if (resolved.ok && resolved.value.disabled) {
        issues.push(
          error(
            'dependency-healthcheck-missing',
            `"${service.name}" waits for "${target.name}" to be healthy but the health check of "${target.name}" is disabled`,
            path,
            service.name,
          ),
        );
      }
    }
  }

  return issues;
}

function dependencyCycleRule(project: ComposeProject): ValidationIssue[] {
  return findCycles(buildDependencyGraph(project)).map((cycle) => {
    const [first = ''] = cycle;
    return error('dependency-cycle', `Dependency cycle: ${formatCycle(cycle)}`, `services.${first}.depends_on`, first);
  });
}

function portRules(project: ComposeProject): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const published: Array<{ service: string; path: string; mapping: PortMapping; binding: HostBinding }> = [];

  for (const service of project.services) {
    service.ports.forEach((entry, index) => {
      const path = `services.${service.name}.ports[${index}]`;
      const mapping = parsePortMapping(entry);
      if (!mapping.ok) {
        issues.push(error('port-invalid', mapping.error, path, service.name));
        return;
      }
      const binding = hostBindingOf(mapping.value);
      if (binding) published.push({ service: service.name, path, mapping: mapping.value, binding });
    });
  }

  for (let j = 0; j < published.length; j++) {
    const later = published[j];
    if (!later) continue;

    for (let i = 0; i < j; i++) {
      const earlier = published[i];
      if (!earlier) continue;

      const port = collidingPort(later.binding, earlier.binding);
      if (port !== undefined) {
        issues.push(
          error(
            'port-collision',
            `Host port ${port}/${later.binding.protocol} of "${later.service}" is already published by "${earlier.service}" (${earlier.mapping.raw})`,
            later.path,
            later.service,
          ),
        );
        break;
      }
    }
  }

  return issues;
}

function volumeRules(project: ComposeProject): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const declared = new Set(project.volumes.map((volume) => volume.name));
  const used = new Set<string>();

  for (const service of project.services) {
    service.volumes.forEach((entry, index) => {
      const path = `services.${service.name}.volumes[${index}]`;
      const mount = parseVolumeMount(entry);
      if (!mount.ok) {
        issues.push(error('volume-invalid', mount.error, path, service.name));
        return;
      }

      const name = namedVolumeOf(mount.value);
      if (name === undefined) return;

      used.add(name);
      if (!declared.has(name)) {
        issues.push(
          error(
            'volume-undeclared',
            `Service "${service.name}" mounts volume "${name}" which is not declared under top-level volumes`,
            path,
            service.name,
          ),
        );
      }
    });
  }

  for (const volume of project.volumes) {
    if (!used.has(volume.name)) {
      issues.push(warning('volume-unused', `Volume "${volume.name}" is declared but never mounted`, `volumes.${volume.name}`));
    }
  }

  return issues;
}

function networkRules(project: ComposeProject): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const declared = new Set(project.networks.map((network) => network.name));
  const used = new Set<string>();

  for (const service of project.services) {
    for (const network of service.networks) {
      used.add(network);
      if (network !== IMPLICIT_NETWORK && !declared.has(network)) {
        issues.push(
          error(
            'network-undeclared',
            `Service "${service.name}" joins network "${network}" which is not declared under top-level networks`,
            `services.${service.name}.networks.${network}`,
            service.name,
          ),
        );
      }
    }
  }

  for (const network of project.networks) {
    if (!used.has(network.name) && network.name !== IMPLICIT_NETWORK) {
      issues.push(
        warning('network-unused', `Network "${network.name}" is declared but no service joins it`, `networks.${network.name}`),
      );
    }
  }

  return issues;
}

function containerNameRule(project: ComposeProject): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const owners = new Map<string, string>();

  for (const service of project.services) {
    if (service.containerName === undefined) continue;

    const owner = owners.get(service.containerName);
    if (owner !== undefined) {
      issues.push(
        error(
          'container-name-duplicate',
          `Container name "${service.containerName}" is used by both "${owner}" and "${service.name}"`,
          `services.${service.name}.container_name`,
          service.name,
        ),
      );
    } else {
      owners.set(service.containerName, service.name);
    }
  }

  return issues;
}

/**
 * `on-failure` alone takes a `:N` retry limit
 */
function isRestartPolicy(value: string): boolean {
  const [policy, retries, ...rest] = value.split(':');
  if (rest.length > 0 || !RESTART_POLICIES.some((known) => known === policy)) return false;
  return retries === undefined || (policy === 'on-failure' && /^\d+$/.test(retries));
}

function restartPolicyRule(project: ComposeProject): ValidationIssue[] {
  return project.services
    .filter((service) => service.restart !== undefined && !isRestartPolicy(service.restart))
    .map((service) =>
      error(
        'restart-policy-invalid',
        `Restart policy "${service.restart ?? ''}" of "${service.name}" must be no, always, unless-stopped or on-failure[:N]`,
        `services.${service.name}.restart`,
        service.name,
      ),
    );
}

function healthcheckRule(project: ComposeProject): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const service of project.services) {
    if (!service.healthcheck) continue;
    const resolved = resolveHealthCheck(service.healthcheck);
    if (!resolved.ok) {
      issues.push(error('healthcheck-invalid', resolved.error, `services.${service.name}.healthcheck`, service.name));
    }
  }

  return issues;
}

/**
 * An image is pinned when it carries a digest or a tag other than `latest`
 */
export function isImagePinned(image: string): boolean {
  if (image.includes('@')) return true;
  const lastSegment = image.slice(image.lastIndexOf('/') + 1);
  const colon = lastSegment.indexOf(':');
  if (colon === -1) return false;
  return lastSegment.slice(colon + 1) !== 'latest';
}

function imagePinRule(project: ComposeProject): ValidationIssue[] {
  return project.services
    .filter((service) => service.image !== undefined && !service.image.includes('$') && !isImagePinned(service.image))
    .map((service) =>
      warning(
        'image-unpinned',
        `Image "${service.image ?? ''}" of "${service.name}" is not pinned to a version`,
        `services.${service.name}.image`,
        service.name,
      ),
    );
}

export const RULES: readonly Rule[] = [
  { id: 'service-source-missing', description: 'service has an image or a build context', check: serviceSourceRule },
  { id: 'dependency-unknown-service', description: 'depends_on names declared services', check: unknownDependencyRule },
  {
    id: 'dependency-healthcheck-missing',
    description: 'service_healthy targets define an enabled health check',
    check: dependencyHealthcheckRule,
  },
  { id: 'dependency-cycle', description: 'dependencies form no cycle', check: dependencyCycleRule },
  { id: 'port-collision', description: 'port entries parse and host ports are unique', check: portRules },
  { id: 'volume-undeclared', description: 'named volumes are declared and used', check: volumeRules },
  { id: 'network-undeclared', description: 'networks are declared and used', check: networkRules },
  { id: 'container-name-duplicate', description: 'container names are unique', check: containerNameRule },
  { id: 'restart-policy-invalid', description: 'restart policies are recognized', check: restartPolicyRule },
  { id: 'healthcheck-invalid', description: 'health check durations and retries are valid', check: healthcheckRule },
  { id: 'image-unpinned', description: 'images are pinned to a version', check: imagePinRule },
];

/**
 * Run every rule and split the findings by severity
 */
export function validateProject(project: ComposeProject, options: ValidateOptions = {}): ValidationReport {
  const issues = [...(options.additionalIssues ?? []), ...RULES.flatMap((rule) => rule.check(project))];

  const errors = issues.filter((issue) => issue.severity === 'error');
  const warnings = issues.filter((issue) => issue.severity === 'warning');

  return {
    valid: errors.length === 0 && (!options.strict || warnings.length === 0),
    errors,
    warnings,
  };
}
