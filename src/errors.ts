/**
 * Raised when a placeholder cannot be mapped back to its original value.
 * Lookups that miss always surface here.
 */
export class MappingNotFoundError extends Error {
  readonly entityType: string;
  readonly placeholder: string | null;

  constructor(entityType: string, placeholder: string | null = null) {
    super(
      placeholder === null
        ? `No mapping recorded for entity type "${entityType}".`
        : `No original value recorded for placeholder "${placeholder}" of type "${entityType}".`,
    );
    this.name = "MappingNotFoundError";
    this.entityType = entityType;
    this.placeholder = placeholder;
  }
}
