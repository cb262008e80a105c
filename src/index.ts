// src/index.ts
export {
  Dto,
  isAbstractDtoClass,
  isDtoClass,
  type DtoAttributes,
  type DtoClass,
  type DtoCtor,
  type DtoInit,
  type DtoInput,
  type DtoJsonOptions,
} from "./dto/Dto";
export {
  DtoError,
  DtoInvalidArgumentError,
  DtoInvalidKeyError,
  DtoNotFillableError,
  DtoNotFoundError,
  DtoOverrideForbiddenError,
  DtoReadOnlyError,
  DtoUnknownAttributeError,
  isDtoError,
  type DtoErrorCode,
} from "./dto/DtoErrors";
export { DtoFactory, type DtoTarget } from "./dto/DtoFactory";
export {
  DtoCapabilities,
  DTO_OPTION_KEYS,
  resolveDtoOptions,
  type DtoCapability,
  type DtoOptionFlags,
} from "./dto/DtoOptions";
export {
  DtoProperty,
  inferPropertyType,
  isNumericKey,
  isValidAttributeKey,
  type DtoPropertyType,
} from "./dto/DtoProperty";
export { DtoRegistry, dtoRegistry } from "./dto/DtoRegistry";
export { fail, ok, type DtoResult } from "./dto/DtoResult";
export type { IDto } from "./dto/IDto";
export {
  DtoEnvError,
  getDtoEnv,
  loadDtoEnv,
  onDtoEnvChange,
  resetDtoEnv,
  setDtoEnv,
  type DtoEnv,
  type DtoEnvListener,
  type DtoLogLevel,
} from "./env/DtoEnv";
export { bindLogger, getLogLevel, setLogLevel, type DtoLogger } from "./logger/Logger";
