export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** A cached response, replayed for its key until `expiresAt`. */
export interface IdempotencyRecord {
  key: string;
  response: JsonValue;
  createdAt: Date;
  expiresAt: Date;
}
