import { z } from "zod";
import { ValidationError } from "./errors.js";

const uuidSchema = z.string().uuid();
const nonBlankSchema = z.string().trim().min(1);

/**
 * Input checks run before any store access.
 *
 * Construct one at startup and hand it to every repository through the
 * StoreContext.
 */
export class Guard {
  requireString(value: string, field: string): void {
    if (!nonBlankSchema.safeParse(value).success) {
      throw new ValidationError(field, `${field} is required`);
    }
  }

  requireUuid(value: string, field: string): void {
    if (!uuidSchema.safeParse(value).success) {
      throw new ValidationError(field, `${field} must be a UUID`);
    }
  }

  requirePositive(value: number, field: string): void {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ValidationError(field, `${field} must be positive`);
    }
  }

  requireNonNegative(value: number, field: string): void {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(field, `${field} must not be negative`);
    }
  }

  requireDate(value: Date, field: string): void {
    if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
      throw new ValidationError(field, `${field} must be a valid date`);
    }
  }

  requireOneOf<T extends string>(value: string, allowed: readonly T[], field: string): asserts value is T {
    if (!allowed.some((a) => a === value)) {
      throw new ValidationError(field, `${field} must be one of: ${allowed.join(", ")}`);
    }
  }
}
