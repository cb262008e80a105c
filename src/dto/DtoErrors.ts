// src/dto/DtoErrors.ts
/**
 * Purpose:
 * - Error family for the attribute container and its factory.
 * - Every error carries a stable `code` and, where one exists, the offending
 *   attribute name. Messages are prefixed with the code.
 *
 * Notes:
 * - DtoNotFoundError extends DtoInvalidArgumentError: an unknown type name is
 *   an invalid factory argument.
 */

export type DtoErrorCode =
  | "DTO_INVALID_KEY"
  | "DTO_READ_ONLY"
  | "DTO_NOT_FILLABLE"
  | "DTO_OVERRIDE_FORBIDDEN"
  | "DTO_UNKNOWN_ATTRIBUTE"
  | "DTO_INVALID_ARGUMENT"
  | "DTO_NOT_FOUND";

export abstract class DtoError extends Error {
  public readonly code: DtoErrorCode;
  public readonly attribute?: string;

  protected constructor(
    code: DtoErrorCode,
    detail: string,
    attribute?: string,
    options?: { cause?: unknown }
  ) {
    super(`${code}: ${detail}`, options);
    this.name = new.target.name;
    this.code = code;
    this.attribute = attribute;
  }
}

export class DtoInvalidKeyError extends DtoError {
  constructor(key: unknown, reason: string) {
    super(
      "DTO_INVALID_KEY",
      `Property key [${String(key)}] ${reason}.`,
      typeof key === "string" ? key : undefined
    );
  }
}

export class DtoReadOnlyError extends DtoError {
  constructor(property: string, dtoName: string) {
    super(
      "DTO_READ_ONLY",
      `${dtoName} is read only. Unable to set property [${property}].`,
      property
    );
  }
}

export class DtoNotFillableError extends DtoError {
  constructor(property: string, dtoName: string) {
    super(
      "DTO_NOT_FILLABLE",
      `Property [${property}] is not fillable on ${dtoName}.`,
      property
    );
  }
}

export class DtoOverrideForbiddenError extends DtoError {
  constructor(property: string, dtoName: string) {
    super(
      "DTO_OVERRIDE_FORBIDDEN",
      `Property [${property}] is already set on ${dtoName} and cannot be overridden.`,
      property
    );
  }
}

export class DtoUnknownAttributeError extends DtoError {
  constructor(property: string, dtoName: string) {
    super(
      "DTO_UNKNOWN_ATTRIBUTE",
      `Property [${property}] was not found on ${dtoName}.`,
      property
    );
  }
}

export class DtoInvalidArgumentError extends DtoError {
  constructor(
    message: string,
    options?: { cause?: unknown },
    code: "DTO_INVALID_ARGUMENT" | "DTO_NOT_FOUND" = "DTO_INVALID_ARGUMENT"
  ) {
    super(code, message, undefined, options);
  }
}

export class DtoNotFoundError extends DtoInvalidArgumentError {
  constructor(typeName: string) {
    super(`Dto class [${typeName}] not found.`, undefined, "DTO_NOT_FOUND");
  }
}

export function isDtoError(err: unknown): err is DtoError {
  return err instanceof DtoError;
}
