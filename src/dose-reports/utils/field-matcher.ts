import { FieldValue } from '../domain/entities/dose-report.entity';

/**
 * First-match-wins lookup: returns the trimmed first capture group of the
 * first pattern that yields a non-empty capture. Later patterns are not tried.
 */
export function matchFirst(
  text: string,
  patterns: readonly RegExp[],
): FieldValue {
  for (const pattern of patterns) {
    const captured = pattern.exec(text)?.[1]?.trim();
    if (captured) {
      return captured;
    }
  }
  return null;
}

/**
 * Binds matchFirst to one text (a whole report or one acquisition block).
 */
export function createFieldReader(
  text: string,
): (patterns: readonly RegExp[]) => FieldValue {
  return (patterns) => matchFirst(text, patterns);
}
