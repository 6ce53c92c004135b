export { UUID } from "./core/UUID"
export type { UUIDInitOptions } from "./core/UUID"
export { UUIDValue } from "./core/UUIDValue"
export { UUIDParser } from "./core/UUIDParser"
export type { ParseFailure, ParseResult, UUIDInput } from "./core/UUIDParser"
export { UUIDGenerator } from "./core/UUIDGenerator"
export type { DceOptions, TimeBasedOptions, UUIDGeneratorConfig } from "./core/UUIDGenerator"
export { ClockSequence, CLOCK_SEQ_MASK } from "./core/ClockSequence"
export type { ClockSequenceOptions } from "./core/ClockSequence"
export { NodeResolver, NODE_ENV_VAR } from "./core/NodeResolver"
export type { NodeResolution } from "./core/NodeResolver"
export { Namespace } from "./core/Namespace"
export type { NamespaceName } from "./core/Namespace"

export { LayoutCodec, UUID_BYTE_LENGTH, NODE_BYTE_LENGTH } from "./encoding/LayoutCodec"
export { VersionTagger } from "./encoding/VersionTagger"
export { HexEncoder, HYPHENATED_LENGTH, PLAIN_LENGTH } from "./encoding/HexEncoder"
export { NameHasher } from "./crypto/NameHasher"
export type { NameVersion } from "./crypto/NameHasher"

export { UUIDError, ParseError, DecodeError, GenerationError } from "./errors/UUIDError"
export type {
  ParseFailureReason,
  DecodeFailureReason,
  GenerationFailureReason,
} from "./errors/UUIDError"

export { NodePlatformIds, StaticPlatformIds } from "./platform/PlatformIds"
export type { PlatformIds } from "./platform/PlatformIds"

export { UUIDPostgresAdapter } from "./adapters/postgres/UUIDPostgresAdapter"
export { UUIDMongoAdapter } from "./adapters/mongo/UUIDMongoAdapter"
export type { UUIDDocument } from "./adapters/mongo/UUIDMongoAdapter"

export { TimeUtils, GREGORIAN_OFFSET, MAX_TIMESTAMP } from "./utils/TimeUtils"
export type { TimeSource } from "./utils/TimeUtils"
export { createLogger, silentLogger } from "./utils/logger"
export type { Logger, LoggerOptions } from "./utils/logger"

export { Version, Variant, Domain } from "./types"
export type { HexCase, NameScheme, UUIDFields, UUIDMetadata } from "./types"
