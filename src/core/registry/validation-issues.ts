import { ValidationError } from 'class-validator';

/**
 * Flatten nested class-validator errors into `path: message` strings
 */
export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): string[] {
  const issues: string[] = [];

  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;

    for (const message of Object.values(error.constraints ?? {})) {
      issues.push(`${path}: ${message}`);
    }

    if (error.children && error.children.length > 0) {
      issues.push(...flattenValidationErrors(error.children, path));
    }
  }

  return issues;
}
