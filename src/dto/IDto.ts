// src/dto/IDto.ts
/**
 * Purpose:
 * - Minimal read surface every DTO exposes to callers that only consume
 *   attributes (serializers, loggers, other DTO factories).
 */

export interface IDto {
  /** Class-level discriminator (the concrete class name). */
  getType(): string;

  has(name: string): boolean;

  get(name: string): unknown;

  /** Defensive copy of the current attribute map. */
  all(): Record<string, unknown>;

  toJson(): string;
}
