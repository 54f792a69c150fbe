/**
 * Text rendering for command output
 */

import type { ValidationIssue, ValidationReport } from '../domain/types/compose.js';
import type { ProjectDescription, ServiceDescription } from '../compose/inspector.js';

export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function renderIssue(issue: ValidationIssue): string {
  const icon = issue.severity === 'error' ? '✖' : '⚠️ ';
  return `  ${icon} [${issue.rule}] ${issue.path}: ${issue.message}`;
}

export function renderValidationReport(report: ValidationReport, displayPath: string): string {
  const counts = `${pluralize(report.errors.length, 'error')}, ${pluralize(report.warnings.length, 'warning')}`;
  const headline = report.valid
    ? `✅ ${displayPath} is valid (${counts})`
    : `❌ ${displayPath} is invalid (${counts})`;

  return [headline, ...report.errors.map(renderIssue), ...report.warnings.map(renderIssue)].join('\n') + '\n';
}

function renderService(service: ServiceDescription): string[] {
  const lines = [`  ${service.name}`, `    source: ${service.source}`];

  if (service.containerName !== undefined) lines.push(`    container: ${service.containerName}`);
  if (service.restart !== undefined) lines.push(`    restart: ${service.restart}`);
  if (service.ports.length > 0) lines.push(`    ports: ${service.ports.join(', ')}`);
  if (service.networks.length > 0) lines.push(`    networks: ${service.networks.join(', ')}`);
  if (service.volumes.length > 0) lines.push(`    volumes: ${service.volumes.join(', ')}`);
  if (service.envFiles.length > 0) lines.push(`    env files: ${service.envFiles.join(', ')}`);

  const check = service.healthcheck;
  if (check) {
    lines.push(
      check.disabled
        ? '    healthcheck: disabled'
        : `    healthcheck: ${check.command} (interval ${check.interval}, timeout ${check.timeout}, retries ${check.retries}, ready within ${check.readinessWindow})`,
    );
  }

  if (service.dependsOn.length > 0) {
    lines.push(`    depends on: ${service.dependsOn.map((d) => `${d.service} (${d.condition})`).join(', ')}`);
  }

  return lines;
}

export function renderProjectDescription(description: ProjectDescription): string {
  const lines: string[] = [];

  if (description.name !== undefined) lines.push(`Project: ${description.name}`);
  lines.push('Services:', ...description.services.flatMap(renderService));
  if (description.volumes.length > 0) lines.push(`Volumes: ${description.volumes.join(', ')}`);
  if (description.networks.length > 0) lines.push(`Networks: ${description.networks.join(', ')}`);
  if (description.variables.length > 0) lines.push(`Variables: ${description.variables.join(', ')}`);

  if (description.startupTiers) {
    lines.push('Startup order:');
    description.startupTiers.forEach((tier, index) => lines.push(`  ${index + 1}. ${tier.join(', ')}`));
  } else {
    lines.push('Startup order: unavailable (dependency cycle)');
  }

  return lines.join('\n') + '\n';
}
