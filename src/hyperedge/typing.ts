/**
 * Auto-typing for loosely written atoms: `"blood pressure"` becomes
 * `blood_pressure/C`, while anything already carrying a `/type` is kept.
 */

function canonLabel(text: string): string {
  return text.trim().replace(/\s+/g, '_');
}

function ensureTyped(text: string, type: string): string {
  return text.includes('/') ? text.trim() : `${canonLabel(text)}/${type}`;
}

export function typedConcept(text: string): string {
  return ensureTyped(text, 'C');
}

export function typedPredicate(text: string): string {
  return ensureTyped(text, 'P');
}
