import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { readFile } from 'fs/promises';
import { parse } from 'yaml';
import {
  flattenValidationErrors,
  ValidationIssue,
} from '../../common/validation/validation-issues';
import { Workflow, WorkflowJob } from './workflow.schema';

type YamlMapping = Record<string, unknown>;

/**
 * Checks a GitHub Actions workflow for misspelt keys and malformed steps.
 * @returns One issue per problem, empty when the workflow is clean
 */
export function lintWorkflow(source: string): ValidationIssue[] {
  let raw: unknown;
  try {
    raw = parse(source);
  } catch (error) {
    return [
      { path: '', message: error instanceof Error ? error.message : String(error) },
    ];
  }

  if (!isMapping(raw)) {
    return [{ path: '', message: 'workflow must be a mapping' }];
  }

  const issues = validateAs(Workflow, raw, '');
  if (!isMapping(raw.jobs)) {
    return issues;
  }

  for (const [jobId, job] of Object.entries(raw.jobs)) {
    const jobPath = `jobs.${jobId}`;
    if (!isMapping(job)) {
      issues.push({ path: jobPath, message: 'job must be a mapping' });
      continue;
    }

    issues.push(...validateAs(WorkflowJob, job, jobPath));

    if (Array.isArray(job.steps)) {
      job.steps.forEach((step: unknown, index) => {
        issues.push(...checkStepTarget(step, `${jobPath}.steps[${index}]`));
      });
    }
  }

  return issues;
}

export async function lintWorkflowFile(
  file: string,
): Promise<ValidationIssue[]> {
  return lintWorkflow(await readFile(file, 'utf-8'));
}

function validateAs<T extends object>(
  cls: ClassConstructor<T>,
  value: YamlMapping,
  path: string,
): ValidationIssue[] {
  const errors = validateSync(plainToInstance(cls, value), {
    whitelist: true,
    forbidNonWhitelisted: true,
  });

  return flattenValidationErrors(errors, path);
}

// A step runs either an action or a shell command, never both
function checkStepTarget(step: unknown, path: string): ValidationIssue[] {
  if (!isMapping(step)) {
    return [];
  }

  const hasUses = 'uses' in step;
  const hasRun = 'run' in step;
  const issues: ValidationIssue[] = [];

  if (!hasUses && !hasRun) {
    issues.push({ path, message: 'step must define either "uses" or "run"' });
  } else if (hasUses && hasRun) {
    issues.push({ path, message: 'step cannot define both "uses" and "run"' });
  }
  if ('with' in step && !hasUses) {
    issues.push({ path, message: '"with" is only valid on a "uses" step' });
  }

  return issues;
}

function isMapping(value: unknown): value is YamlMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
