// core/src/ble/types.ts
// Transport type definitions and configuration for mdoc BLE central client mode

import { MdocError } from '../types/errors';

// ===== CONFIGURATION =====

export const BLE_CONFIG = {
    // Characteristic UUIDs, mdoc central client mode
    CHARACTERISTICS: {
        STATE: '00000005-a123-48ce-896b-4c76973373e6',
        CLIENT2SERVER: '00000006-a123-48ce-896b-4c76973373e6',
        SERVER2CLIENT: '00000007-a123-48ce-896b-4c76973373e6',
        IDENT: '00000008-a123-48ce-896b-4c76973373e6',
        L2CAP_PSM: '0000000b-a123-48ce-896b-4c76973373e6'
    },

    // Client Characteristic Configuration Descriptor
    CCCD_UUID: '00002902-0000-1000-8000-00805f9b34fb',

    // State characteristic values
    STATE_START: 0x01,
    STATE_END: 0x02,

    // MTU and attribute sizing
    MTU_REQUEST: 515,
    DEFAULT_MTU: 23,
    ATT_HEADER_SIZE: 3,
    MAX_ATTRIBUTE_SIZE: 512,
    DEFAULT_ATTRIBUTE_SIZE: 20,

    // Timing parameters (ms)
    MTU_TIMEOUT: 2000,
    LINGER_DELAY: 500,
    SCAN_DURATION: 10000,

    // L2CAP
    SOCKET_LENGTH_PREFIX: 4,
    MAX_PSM_LENGTH: 4
} as const;

// ===== TRANSPORT STATE =====

export enum TransportState {
    IDLE = 'IDLE',
    CONNECTING = 'CONNECTING',
    SERVICE_DISCOVERY = 'SERVICE_DISCOVERY',
    MTU_NEGOTIATION = 'MTU_NEGOTIATION',
    IDENT_EXCHANGE = 'IDENT_EXCHANGE',
    SOCKET_SETUP = 'SOCKET_SETUP',
    NOTIFICATION_SETUP = 'NOTIFICATION_SETUP',
    HANDSHAKE = 'HANDSHAKE',
    OPEN = 'OPEN',
    CLOSING = 'CLOSING',
    CLOSED = 'CLOSED'
}

export type TransportMode = 'gatt' | 'l2cap';

/**
 * Logical characteristic roles, resolved to UUIDs through CharacteristicUuids
 */
export type CharacteristicRole = 'state' | 'client2server' | 'server2client' | 'ident' | 'l2cap';

export type NotifyingCharacteristic = 'state' | 'server2client';

export interface CharacteristicUuids {
    state: string;
    client2server: string;
    server2client: string;
    ident?: string;
    l2cap?: string;
}

export const DEFAULT_CHARACTERISTICS: CharacteristicUuids = {
    state: BLE_CONFIG.CHARACTERISTICS.STATE,
    client2server: BLE_CONFIG.CHARACTERISTICS.CLIENT2SERVER,
    server2client: BLE_CONFIG.CHARACTERISTICS.SERVER2CLIENT,
    ident: BLE_CONFIG.CHARACTERISTICS.IDENT,
    l2cap: BLE_CONFIG.CHARACTERISTICS.L2CAP_PSM
};

/**
 * Per-connection configuration; everything except the service UUID has a default
 */
export interface ConnectionConfig {
    serviceUuid: string;
    characteristics: CharacteristicUuids;
    mtuRequest: number;
    mtuTimeoutMs: number;
    lingerDelayMs: number;
    useL2CAP: boolean;
    /** Expected Ident characteristic value, see deriveBleIdent() */
    expectedIdent?: Uint8Array;
}

export function createConnectionConfig(
    config: Partial<ConnectionConfig> & Pick<ConnectionConfig, 'serviceUuid'>
): ConnectionConfig {
    return {
        characteristics: DEFAULT_CHARACTERISTICS,
        mtuRequest: BLE_CONFIG.MTU_REQUEST,
        mtuTimeoutMs: BLE_CONFIG.MTU_TIMEOUT,
        lingerDelayMs: BLE_CONFIG.LINGER_DELAY,
        useL2CAP: true,
        ...config
    };
}

// ===== DISCOVERY =====

export interface PeerCandidate {
    deviceId: string;
    rssi: number;
    serviceUuid: string;
    /** Scan order of the most recent advertisement, used for tie-breaking */
    sequence: number;
    lastSeen: number;
}

export type ScanEvent =
    | { type: 'scanning-started'; serviceUuid: string; durationMs: number }
    | { type: 'device-selected'; candidate: PeerCandidate }
    | { type: 'no-device-found'; serviceUuid: string }
    | { type: 'error'; error: MdocError };

export type ScanEventCallback = (event: ScanEvent) => void;

export interface DiscoveredService {
    serviceFound: boolean;
    characteristics: string[];
}

// ===== APPLICATION LISTENER =====

/**
 * Callbacks toward the application layer
 */
export interface TransportListener {
    onPeerConnected(): void;
    onMessageReceived(message: Uint8Array): void;
    onPeerDisconnected(): void;
    onTransportSpecificTermination(): void;
    onError(error: MdocError): void;
}

export type StateChangeCallback<S = TransportState> = (state: S, previous: S) => void;

export function sameUuid(a: string, b: string): boolean {
    return a.toLowerCase() === b.toLowerCase();
}
