/**
 * A row came back from the store in a shape the domain cannot represent
 * (unknown enum value, malformed JSON, bad timestamp).
 */
export class StoreReadError extends Error {
  constructor(
    public readonly table: string,
    public readonly rowId: unknown,
    detail: string
  ) {
    super(`Cannot decode ${table} row ${String(rowId)}: ${detail}`);
    this.name = 'StoreReadError';
  }
}
