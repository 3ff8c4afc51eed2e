// core/src/index.ts

// Errors and results
export {
    ErrorKind,
    MdocErrorCode,
    MdocError,
    ok,
    err,
    attempt,
    describeError
} from './types/errors';
export type { Result } from './types/errors';

// CBOR
export { CborTagged, CBOR_TAGS } from './cbor/types';
export type { CborValue, CborKey, CborMap } from './cbor/types';
export {
    encodeCbor,
    parseCbor,
    decodeCbor,
    encodeEmbedded,
    tagEncoded,
    embeddedBytes,
    decodeEmbedded,
    asMap,
    asArray,
    asBytes,
    asText,
    asInt,
    getRequired
} from './cbor/cbor';

// Crypto types
export {
    EcCurve,
    CoseAlgorithm,
    SessionRole,
    SessionCryptoState,
    SessionStatus,
    ENCRYPTION_CONFIG
} from './types/crypto';
export type {
    CurveInfo,
    EcPublicKeyCoordinates,
    DecryptedSessionMessage,
    SessionEncryptionStatistics
} from './types/crypto';

// Crypto
export {
    COSE_KEY,
    EcPublicKey,
    EcKeyPair,
    curveInfo,
    isSupportedCurve,
    hashForAlgorithm
} from './crypto/keypair';
export {
    COSE_HEADER,
    COSE_TAG,
    coseSign1Sign,
    coseSign1Verify,
    encodeCoseSign1,
    decodeCoseSign1,
    certificateChainOf,
    coseMac0,
    coseMac0Verify,
    encodeCoseMac0,
    decodeCoseMac0,
    buildSigStructure,
    buildMacStructure,
    signatureDerToRaw,
    signatureRawToDer
} from './crypto/cose';
export type { CoseSign1, CoseMac0, CoseSign1Options } from './crypto/cose';
export {
    buildSessionTranscript,
    encodeKeyBytes,
    deriveBleIdent,
    transcriptSalt,
    buildDeviceAuthenticationBytes
} from './crypto/transcript';
export {
    SessionEncryption,
    deriveSessionKeys,
    buildNonce,
    parseSessionEstablishment,
    encodeSessionStatus
} from './crypto/encryption';
export type { SessionKeys, SessionEstablishment } from './crypto/encryption';

// BLE types and configuration
export {
    BLE_CONFIG,
    TransportState,
    DEFAULT_CHARACTERISTICS,
    createConnectionConfig,
    sameUuid
} from './ble/types';
export type {
    TransportMode,
    CharacteristicRole,
    NotifyingCharacteristic,
    CharacteristicUuids,
    ConnectionConfig,
    PeerCandidate,
    ScanEvent,
    ScanEventCallback,
    DiscoveredService,
    TransportListener,
    StateChangeCallback
} from './ble/types';

// Chunking
export {
    CHUNK_MARKER,
    SHUTDOWN_CHUNK,
    attributeSizeForMtu,
    encodeChunks,
    appendChunk,
    ChunkDecoder,
    frameSocketMessage,
    SocketFrameReader
} from './ble/chunking';
export type { ChunkDecodeOutput, ReassemblyStep } from './ble/chunking';

// Transport state machine
export { createTransportContext, transition } from './ble/transport';
export type {
    TransportEvent,
    TransportAction,
    TransportContext,
    ListenerNotification,
    OutboundItem,
    Transition,
    TimerName
} from './ble/transport';

// Platform abstractions
export { BLEScanner } from './ble/scanner';
export type { ScannerStatistics } from './ble/scanner';
export { BLEConnectionManager } from './ble/connection';
export type { ConnectionStatistics } from './ble/connection';
export { GattServerTransport, ServerState, createServerConfig } from './ble/server';
export type { ServerConfig } from './ble/server';
export { BLEManager } from './ble/manager';
export type {
    SessionManagerConfig,
    SessionEvent,
    SessionEventCallback,
    SessionManagerStatistics,
    TerminationReason
} from './ble/manager';

// Utilities
export { DebugLogger, debug, debugBLE, debugCrypto, isLogLevel } from './utils/debug';
export type { LogLevel, LogEntry, DebugConfig } from './utils/debug';
export { bytesToHex, hexToBytes, concatBytes, utf8ToBytes, equalBytes } from './utils/bytes';
