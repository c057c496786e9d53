import { Result, ok, err } from '../types/result.js';
import type { NotificationError } from '../types/notification-error.js';

/**
 * Job the execution belongs to
 */
export interface JobInfo {
  readonly name: string;
  readonly href: string;
}

/**
 * Execution attributes supplied by the host for one notification
 */
export interface ExecutionData {
  readonly id: string;
  readonly href: string;
  readonly project: string;
  readonly job: JobInfo;
  readonly failedNodeListString?: string;
  readonly failedNodeList?: readonly string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Hosts hand over ids as numbers and everything else as strings.
function readText(source: Readonly<Record<string, unknown>>, key: string): string | undefined {
  const value = source[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

function readStringList(source: Readonly<Record<string, unknown>>, key: string): readonly string[] | undefined {
  const value = source[key];
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Build ExecutionData from the host's execution mapping.
 *
 * Every missing required attribute is reported at once, the way a template
 * merge fails on an undefined variable.
 */
export function parseExecutionData(raw: Readonly<Record<string, unknown>>): Result<ExecutionData, NotificationError> {
  const missingFields: string[] = [];

  const id = readText(raw, 'id');
  const href = readText(raw, 'href');
  const project = readText(raw, 'project');
  const job: Readonly<Record<string, unknown>> = isRecord(raw.job) ? raw.job : {};
  const jobName = readText(job, 'name');
  const jobHref = readText(job, 'href');

  if (id === undefined) missingFields.push('id');
  if (href === undefined) missingFields.push('href');
  if (project === undefined) missingFields.push('project');
  if (jobName === undefined) missingFields.push('job.name');
  if (jobHref === undefined) missingFields.push('job.href');

  if (
    missingFields.length > 0 ||
    id === undefined ||
    href === undefined ||
    project === undefined ||
    jobName === undefined ||
    jobHref === undefined
  ) {
    return err({
      type: 'RENDER_ERROR',
      message: `Error merging Slack notification message template: [missing execution data: ${missingFields.join(', ')}].`,
    });
  }

  return ok({
    id,
    href,
    project,
    job: {
      name: jobName,
      href: jobHref,
    },
    failedNodeListString: readText(raw, 'failedNodeListString'),
    failedNodeList: readStringList(raw, 'failedNodeList'),
  });
}
