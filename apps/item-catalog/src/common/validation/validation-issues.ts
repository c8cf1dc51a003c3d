import { ValidationError } from 'class-validator';

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Flattens a class-validator error tree into one issue per failed constraint.
 * Array members are addressed with brackets: `jobs.test.steps[1].rn`.
 */
export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): ValidationIssue[] {
  return errors.flatMap((error) => {
    const path = joinPath(parentPath, error.property);
    const own = Object.values(error.constraints ?? {}).map((message) => ({
      path,
      message,
    }));

    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}

export function formatValidationIssues(issues: ValidationIssue[]): string {
  return issues
    .map(({ path, message }) => `  - ${path || '<root>'}: ${message}`)
    .join('\n');
}

function joinPath(parentPath: string, property: string): string {
  if (/^\d+$/.test(property)) {
    return `${parentPath}[${property}]`;
  }

  return parentPath ? `${parentPath}.${property}` : property;
}
