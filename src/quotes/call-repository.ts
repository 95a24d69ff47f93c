import type { QueryOptions } from "../db/timeouts.js";
import type { Call } from "./repository-types.js";

export interface ICallRepository {
  getById(id: string, opts?: QueryOptions): Promise<Call>;
  saveQuote(id: string, quoteSummary: string, opts?: QueryOptions): Promise<void>;
}
