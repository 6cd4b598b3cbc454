/**
 * Configuration Report
 *
 * Runs the configuration validators for every requested project and
 * environment and collects the rendered instance names and errors.
 * Used by validate-config.ts; kept free of console output.
 */

import { getAutoScalingConfig } from '../lib/config/autoscaling/configurations';
import { Environment, isValidEnvironment, resolveEnvironment } from '../lib/config/environments';
import { getInstanceConfig } from '../lib/config/instance/configurations';
import { Project, getAvailableProjects, isValidProject } from '../lib/config/projects';
import { validateAutoScalingConfig, validateInstanceConfig } from '../lib/utilities/config-validation';
import { instanceName } from '../lib/utilities/naming';

export interface ConfigReport {
  readonly project: Project;
  readonly environment: Environment;
  /** Instance names the configuration renders to */
  readonly names: string[];
  readonly errors: string[];
}

export interface ReportOptions {
  /** @default every project */
  readonly projects?: Project[];
  /** @default every environment */
  readonly environments?: Environment[];
}

/** Raw `-p` / `-e` flags of the validate command */
export interface ReportFlags {
  readonly project?: string;
  readonly environment?: string;
}

export type ReportSelection = { readonly options: ReportOptions } | { readonly error: string };

/**
 * Turn command flags into report options, or an error for an unknown
 * project or environment.
 */
export function selectReports(flags: ReportFlags): ReportSelection {
  if (flags.project !== undefined && !isValidProject(flags.project)) {
    return { error: `Invalid project '${flags.project}'. Valid projects: ${getAvailableProjects().join(', ')}` };
  }
  if (flags.environment !== undefined && !isValidEnvironment(flags.environment)) {
    return {
      error: `Invalid environment '${flags.environment}'. ` +
        `Valid environments: ${Object.values(Environment).join(', ')}, dev, prod`,
    };
  }
  return {
    options: {
      projects: flags.project !== undefined && isValidProject(flags.project) ? [flags.project] : undefined,
      environments: flags.environment !== undefined ? [resolveEnvironment(flags.environment)] : undefined,
    },
  };
}

export function reportFor(project: Project, environment: Environment): ConfigReport {
  switch (project) {
    case Project.INSTANCE: {
      const config = getInstanceConfig(environment);
      const errors = validateInstanceConfig(config, environment);
      // Names render only from a valid configuration
      const names = errors.length > 0 ? [] : Array.from({ length: config.instanceCount }, (_, i) =>
        instanceName({ os: config.os, environment, purpose: config.purpose, index: i + 1 }),
      );
      return { project, environment, names, errors };
    }
    case Project.AUTOSCALING: {
      const config = getAutoScalingConfig(environment);
      const errors = validateAutoScalingConfig(config, environment);
      const names = errors.length > 0 ? [] : [instanceName({ os: config.os, environment, purpose: config.purpose })];
      return { project, environment, names, errors };
    }
  }
}

export function buildConfigReports(options: ReportOptions = {}): ConfigReport[] {
  const projects = options.projects ?? Object.values(Project);
  const environments = options.environments ?? Object.values(Environment);

  return projects.flatMap((project) =>
    environments.map((environment) => reportFor(project, environment)),
  );
}

export function hasErrors(reports: readonly ConfigReport[]): boolean {
  return reports.some((report) => report.errors.length > 0);
}
