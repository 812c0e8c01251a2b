/**
 * Version of the contract document format accepted by the loader.
 *
 * Documents must share the MAJOR component. Increment:
 * - MAJOR: a field is removed or changes meaning
 * - MINOR: an optional field or a new rule type is added
 * - PATCH: clarifications only
 */
export const DOCUMENT_SCHEMA_VERSION = '1.0.0';

export function majorOf(version: string): number {
  return Number.parseInt(version.split('.')[0] ?? '', 10);
}

export function isCompatibleSchemaVersion(version: string): boolean {
  return majorOf(version) === majorOf(DOCUMENT_SCHEMA_VERSION);
}
