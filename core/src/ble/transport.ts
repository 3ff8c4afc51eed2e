// core/src/ble/transport.ts
// ================================================================================================
// Link Transport State Machine
// ================================================================================================
//
// Pure transition function for one central-client connection:
//
//   IDLE -> CONNECTING -> SERVICE_DISCOVERY -> MTU_NEGOTIATION -> [IDENT_EXCHANGE]
//        -> SOCKET_SETUP                            (L2CAP path)
//        -> NOTIFICATION_SETUP -> HANDSHAKE         (characteristic path)
//        -> OPEN -> CLOSING -> CLOSED
//
// transition(context, event) never performs I/O. It returns the next context and a list
// of actions; BLEConnectionManager executes the actions against the platform and feeds
// the platform's completions back in as events, one at a time.
//
// Platform callbacks that do not fit the current state close the connection with an
// error. Application requests (send, disconnect) that do not fit are logged and
// ignored here; the driver rejects them before they get this far.

import {
    BLE_CONFIG,
    type ConnectionConfig,
    type DiscoveredService,
    type NotifyingCharacteristic,
    type TransportMode,
    TransportState,
    sameUuid
} from './types';
import {
    SHUTDOWN_CHUNK,
    appendChunk,
    attributeSizeForMtu,
    encodeChunks,
    frameSocketMessage
} from './chunking';
import { MdocError, MdocErrorCode } from '../types/errors';
import { bytesToHex, equalBytes, readUintBE } from '../utils/bytes';

// ===== EVENTS AND ACTIONS =====

export type TimerName = 'mtu' | 'linger';

export type ReadableCharacteristic = 'ident' | 'l2cap';

export type WritableCharacteristic = 'client2server' | 'state';

export type TransportEvent =
    // Application requests
    | { type: 'CONNECT'; deviceId: string }
    | { type: 'SEND_MESSAGE'; message: Uint8Array }
    | { type: 'SEND_RAW'; value: Uint8Array }
    | { type: 'SEND_TERMINATION' }
    | { type: 'DISCONNECT' }
    // Platform completions
    | { type: 'CONNECTED' }
    | { type: 'CONNECT_FAILED'; error: MdocError }
    | { type: 'SERVICES_DISCOVERED'; service: DiscoveredService }
    | { type: 'DISCOVERY_FAILED'; error: MdocError }
    | { type: 'MTU_CHANGED'; mtu: number }
    | { type: 'MTU_FAILED'; error: MdocError }
    | { type: 'CHARACTERISTIC_READ'; characteristic: ReadableCharacteristic; value: Uint8Array }
    | { type: 'READ_FAILED'; characteristic: ReadableCharacteristic; error: MdocError }
    | { type: 'NOTIFICATIONS_ENABLED'; characteristic: NotifyingCharacteristic }
    | { type: 'NOTIFICATIONS_FAILED'; characteristic: NotifyingCharacteristic; error: MdocError }
    | { type: 'SOCKET_CONNECTED' }
    | { type: 'SOCKET_FAILED'; error: MdocError }
    | { type: 'WRITE_COMPLETE' }
    | { type: 'WRITE_FAILED'; error: MdocError }
    | { type: 'NOTIFICATION'; characteristic: NotifyingCharacteristic; value: Uint8Array }
    | { type: 'SOCKET_MESSAGE'; message: Uint8Array }
    | { type: 'LINK_LOST' }
    | { type: 'TIMER_FIRED'; timer: TimerName };

export type ListenerNotification =
    | { type: 'peerConnected' }
    | { type: 'messageReceived'; message: Uint8Array }
    | { type: 'peerDisconnected' }
    | { type: 'transportSpecificTermination' }
    | { type: 'error'; error: MdocError };

export type TransportAction =
    | { type: 'connect'; deviceId: string }
    | { type: 'discoverServices' }
    | { type: 'requestMtu'; mtu: number }
    | { type: 'startTimer'; timer: TimerName; delayMs: number }
    | { type: 'cancelTimer'; timer: TimerName }
    | { type: 'readCharacteristic'; characteristic: ReadableCharacteristic }
    | { type: 'openSocket'; psm: number }
    | { type: 'enableNotifications'; characteristic: NotifyingCharacteristic }
    | { type: 'writeCharacteristic'; characteristic: WritableCharacteristic; value: Uint8Array }
    | { type: 'writeSocket'; value: Uint8Array }
    | { type: 'notify'; notification: ListenerNotification }
    | { type: 'log'; level: 'debug' | 'info' | 'warn'; message: string }
    | { type: 'teardown' };

/**
 * One queued outbound write. `close` items are never written; reaching the head
 * of the queue starts the shutdown linger on the socket path.
 */
export interface OutboundItem {
    kind: 'chunk' | 'sentinel' | 'state' | 'raw' | 'close';
    target: WritableCharacteristic | 'socket';
    value: Uint8Array;
}

export interface TransportContext {
    readonly state: TransportState;
    readonly config: ConnectionConfig;
    readonly l2capSupported: boolean;
    readonly deviceId: string | null;
    readonly mode: TransportMode | null;
    readonly attributeSize: number;
    readonly mtuDegraded: boolean;
    readonly hasIdent: boolean;
    readonly hasL2cap: boolean;
    readonly reassembly: Uint8Array;
    /** Messages completed before the handshake write was acknowledged */
    readonly heldMessages: readonly Uint8Array[];
    readonly outbound: readonly OutboundItem[];
    readonly inFlight: OutboundItem | null;
    readonly shutdownRequested: boolean;
}

export interface Transition {
    context: TransportContext;
    actions: TransportAction[];
}

export function createTransportContext(config: ConnectionConfig, l2capSupported: boolean): TransportContext {
    return {
        state: TransportState.IDLE,
        config,
        l2capSupported,
        deviceId: null,
        mode: null,
        attributeSize: BLE_CONFIG.DEFAULT_ATTRIBUTE_SIZE,
        mtuDegraded: false,
        hasIdent: false,
        hasL2cap: false,
        reassembly: new Uint8Array(0),
        heldMessages: [],
        outbound: [],
        inFlight: null,
        shutdownRequested: false
    };
}

// ===== HELPERS =====

const SETUP_STATES: readonly TransportState[] = [
    TransportState.CONNECTING,
    TransportState.SERVICE_DISCOVERY,
    TransportState.MTU_NEGOTIATION,
    TransportState.IDENT_EXCHANGE,
    TransportState.SOCKET_SETUP,
    TransportState.NOTIFICATION_SETUP,
    TransportState.HANDSHAKE
];

function stay(context: TransportContext, ...actions: TransportAction[]): Transition {
    return { context, actions };
}

function log(level: 'debug' | 'info' | 'warn', message: string): TransportAction {
    return { type: 'log', level, message };
}

function notify(notification: ListenerNotification): TransportAction {
    return { type: 'notify', notification };
}

function shutDown(context: TransportContext, notifications: ListenerNotification[]): Transition {
    return {
        context: {
            ...context,
            state: TransportState.CLOSED,
            outbound: [],
            inFlight: null,
            reassembly: new Uint8Array(0),
            heldMessages: []
        },
        actions: [
            { type: 'cancelTimer', timer: 'mtu' },
            { type: 'cancelTimer', timer: 'linger' },
            ...notifications.map(notify),
            { type: 'teardown' }
        ]
    };
}

function fail(context: TransportContext, error: MdocError): Transition {
    return shutDown(context, [{ type: 'error', error }]);
}

function unexpected(context: TransportContext, event: TransportEvent): Transition {
    return fail(context, MdocError.protocol(
        MdocErrorCode.UNEXPECTED_EVENT,
        `Unexpected ${event.type} in state ${context.state}`
    ));
}

/**
 * Issue the next queued write if none is outstanding
 */
function pump(context: TransportContext, actions: TransportAction[]): Transition {
    if (context.inFlight || context.outbound.length === 0) {
        return { context, actions };
    }
    const [next, ...rest] = context.outbound;

    if (next.kind === 'close') {
        return {
            context: { ...context, outbound: rest, state: TransportState.CLOSING },
            actions: [
                ...actions,
                log('info', 'Outbound queue drained, closing after linger delay'),
                { type: 'startTimer', timer: 'linger', delayMs: context.config.lingerDelayMs }
            ]
        };
    }

    const write: TransportAction = next.target === 'socket'
        ? { type: 'writeSocket', value: next.value }
        : { type: 'writeCharacteristic', characteristic: next.target, value: next.value };

    return {
        context: { ...context, outbound: rest, inFlight: next },
        actions: [...actions, write]
    };
}

function enqueue(context: TransportContext, items: OutboundItem[], shutdownRequested: boolean = false): Transition {
    return pump({
        ...context,
        outbound: [...context.outbound, ...items],
        shutdownRequested: context.shutdownRequested || shutdownRequested
    }, []);
}

// ===== SETUP SEQUENCE =====

function onServicesDiscovered(context: TransportContext, service: DiscoveredService): Transition {
    if (!service.serviceFound) {
        return fail(context, MdocError.protocol(
            MdocErrorCode.SERVICE_NOT_FOUND,
            `Service ${context.config.serviceUuid} not found`
        ));
    }

    const present = (uuid: string | undefined): boolean =>
        uuid !== undefined && service.characteristics.some(candidate => sameUuid(candidate, uuid));

    const { characteristics } = context.config;
    const mandatory: Array<[string, string]> = [
        ['State', characteristics.state],
        ['Client2Server', characteristics.client2server],
        ['Server2Client', characteristics.server2client]
    ];
    for (const [name, uuid] of mandatory) {
        if (!present(uuid)) {
            return fail(context, MdocError.protocol(
                MdocErrorCode.CHARACTERISTIC_NOT_FOUND,
                `${name} characteristic ${uuid} not found`
            ));
        }
    }

    const hasIdent = present(characteristics.ident);
    const hasL2cap = context.config.useL2CAP && context.l2capSupported && present(characteristics.l2cap);

    return {
        context: { ...context, state: TransportState.MTU_NEGOTIATION, hasIdent, hasL2cap },
        actions: [
            { type: 'requestMtu', mtu: context.config.mtuRequest },
            { type: 'startTimer', timer: 'mtu', delayMs: context.config.mtuTimeoutMs }
        ]
    };
}

function afterIdent(context: TransportContext, actions: TransportAction[]): Transition {
    if (context.hasL2cap) {
        return {
            context: { ...context, state: TransportState.SOCKET_SETUP },
            actions: [...actions, { type: 'readCharacteristic', characteristic: 'l2cap' }]
        };
    }
    return {
        context: { ...context, state: TransportState.NOTIFICATION_SETUP, mode: 'gatt' },
        actions: [...actions, { type: 'enableNotifications', characteristic: 'server2client' }]
    };
}

function afterMtu(context: TransportContext, actions: TransportAction[]): Transition {
    if (context.hasIdent) {
        return {
            context: { ...context, state: TransportState.IDENT_EXCHANGE },
            actions: [...actions, { type: 'readCharacteristic', characteristic: 'ident' }]
        };
    }
    return afterIdent(context, actions);
}

function onMtuChanged(context: TransportContext, mtu: number): Transition {
    const attributeSize = attributeSizeForMtu(mtu);
    return afterMtu({ ...context, attributeSize }, [
        { type: 'cancelTimer', timer: 'mtu' },
        log('info', `MTU ${mtu} negotiated, attribute size ${attributeSize}`)
    ]);
}

/**
 * The peer may renegotiate after setup; later messages use the new size
 */
function onPeerMtuChanged(context: TransportContext, mtu: number): Transition {
    const attributeSize = attributeSizeForMtu(mtu);
    return stay(
        { ...context, attributeSize },
        log('info', `Peer changed MTU to ${mtu}, attribute size ${attributeSize}`)
    );
}

function onMtuUnavailable(context: TransportContext, reason: string): Transition {
    return afterMtu({ ...context, attributeSize: BLE_CONFIG.DEFAULT_ATTRIBUTE_SIZE, mtuDegraded: true }, [
        { type: 'cancelTimer', timer: 'mtu' },
        log('warn', `MTU negotiation ${reason}, using default attribute size ${BLE_CONFIG.DEFAULT_ATTRIBUTE_SIZE}`)
    ]);
}

function onIdentRead(context: TransportContext, value: Uint8Array): Transition {
    const expected = context.config.expectedIdent;
    let check: TransportAction;
    if (expected === undefined) {
        check = log('debug', `Ident ${bytesToHex(value)} read, no expected value configured`);
    } else if (equalBytes(expected, value)) {
        check = log('info', 'Ident characteristic matches');
    } else {
        check = log('warn', `Ident mismatch: expected ${bytesToHex(expected)}, got ${bytesToHex(value)}`);
    }
    return afterIdent(context, [check]);
}

function onPsmRead(context: TransportContext, value: Uint8Array): Transition {
    if (value.length === 0 || value.length > BLE_CONFIG.MAX_PSM_LENGTH) {
        return fail(context, MdocError.protocol(
            MdocErrorCode.INVALID_PSM,
            `L2CAP PSM value has ${value.length} bytes, expected 1 to ${BLE_CONFIG.MAX_PSM_LENGTH}`
        ));
    }
    const psm = readUintBE(value);
    return stay(context, log('info', `Opening L2CAP channel on PSM ${psm}`), { type: 'openSocket', psm });
}

function onNotificationsEnabled(context: TransportContext, characteristic: NotifyingCharacteristic): Transition {
    if (characteristic === 'server2client') {
        return stay(context, { type: 'enableNotifications', characteristic: 'state' });
    }
    const ready: OutboundItem = { kind: 'state', target: 'state', value: Uint8Array.of(BLE_CONFIG.STATE_START) };
    return pump({ ...context, state: TransportState.HANDSHAKE, outbound: [ready] }, []);
}

function open(context: TransportContext, mode: TransportMode, actions: TransportAction[]): Transition {
    const held = context.heldMessages.map(message => notify({ type: 'messageReceived', message }));
    return pump(
        { ...context, state: TransportState.OPEN, mode, heldMessages: [] },
        [...actions, notify({ type: 'peerConnected' }), ...held]
    );
}

// ===== OPEN CONNECTION =====

function onWriteComplete(context: TransportContext, event: TransportEvent): Transition {
    const completed = context.inFlight;
    if (!completed) {
        return unexpected(context, event);
    }
    const idle = { ...context, inFlight: null };

    if (context.state === TransportState.HANDSHAKE && completed.kind === 'state') {
        return open(idle, 'gatt', [log('debug', 'Ready signal written to State')]);
    }
    if (context.state !== TransportState.OPEN) {
        return unexpected(context, event);
    }
    if (completed.kind === 'sentinel') {
        return {
            context: { ...idle, state: TransportState.CLOSING, outbound: [] },
            actions: [
                log('info', 'Shutdown sentinel written, closing after linger delay'),
                { type: 'startTimer', timer: 'linger', delayMs: context.config.lingerDelayMs }
            ]
        };
    }
    return pump(idle, []);
}

function onServerNotification(context: TransportContext, chunk: Uint8Array): Transition {
    const step = appendChunk(context.reassembly, chunk);
    if (!step.ok) {
        return fail(context, step.error);
    }
    const next = { ...context, reassembly: step.value.buffered };
    const output = step.value.output;

    switch (output.type) {
        case 'pending':
            return stay(next);
        case 'message':
            if (context.state === TransportState.HANDSHAKE) {
                return stay({ ...next, heldMessages: [...context.heldMessages, output.message] });
            }
            return stay(next, notify({ type: 'messageReceived', message: output.message }));
        case 'shutdown':
            return shutDown(next, [{ type: 'peerDisconnected' }]);
    }
}

function onStateNotification(context: TransportContext, value: Uint8Array): Transition {
    if (value.length === 1 && value[0] === BLE_CONFIG.STATE_END) {
        return stay(context, notify({ type: 'transportSpecificTermination' }));
    }
    return fail(context, MdocError.protocol(
        MdocErrorCode.INVALID_STATE_VALUE,
        `Unexpected State characteristic value ${bytesToHex(value)}`
    ));
}

function onSendMessage(context: TransportContext, message: Uint8Array): Transition {
    if (context.mode === 'l2cap') {
        if (message.length === 0) {
            return enqueue(context, [{ kind: 'close', target: 'socket', value: message }], true);
        }
        return enqueue(context, [{ kind: 'chunk', target: 'socket', value: frameSocketMessage(message) }]);
    }

    if (message.length === 0) {
        return enqueue(context, [{ kind: 'sentinel', target: 'client2server', value: SHUTDOWN_CHUNK.slice() }], true);
    }
    const chunks = encodeChunks(message, context.attributeSize - 1);
    return enqueue(context, chunks.map((value): OutboundItem => ({ kind: 'chunk', target: 'client2server', value })));
}

// ===== DISPATCH =====

export function transition(context: TransportContext, event: TransportEvent): Transition {
    const { state } = context;

    if (state === TransportState.CLOSED) {
        return stay(context, log('debug', `Ignoring ${event.type} after close`));
    }

    switch (event.type) {
        // ----- Application requests -----

        case 'CONNECT':
            if (state !== TransportState.IDLE) {
                return stay(context, log('warn', `Ignoring CONNECT in state ${state}`));
            }
            return {
                context: { ...context, state: TransportState.CONNECTING, deviceId: event.deviceId },
                actions: [{ type: 'connect', deviceId: event.deviceId }]
            };

        case 'SEND_MESSAGE':
            if (state !== TransportState.OPEN || context.shutdownRequested) {
                return stay(context, log('warn', `Ignoring SEND_MESSAGE in state ${state}`));
            }
            return onSendMessage(context, event.message);

        case 'SEND_RAW':
            if (state !== TransportState.OPEN || context.shutdownRequested) {
                return stay(context, log('warn', `Ignoring SEND_RAW in state ${state}`));
            }
            return enqueue(context, [{
                kind: 'raw',
                target: context.mode === 'l2cap' ? 'socket' : 'client2server',
                value: event.value
            }]);

        case 'SEND_TERMINATION':
            if (state !== TransportState.OPEN || context.mode !== 'gatt' || context.shutdownRequested) {
                return stay(context, log('warn', `Ignoring SEND_TERMINATION in state ${state}`));
            }
            return enqueue(context, [{ kind: 'state', target: 'state', value: Uint8Array.of(BLE_CONFIG.STATE_END) }]);

        case 'DISCONNECT':
            if (state === TransportState.IDLE) {
                return stay({ ...context, state: TransportState.CLOSED });
            }
            return shutDown(context, []);

        // ----- Connection setup -----

        case 'CONNECTED':
            if (state !== TransportState.CONNECTING) return unexpected(context, event);
            return {
                context: { ...context, state: TransportState.SERVICE_DISCOVERY },
                actions: [{ type: 'discoverServices' }]
            };

        case 'CONNECT_FAILED':
            if (state !== TransportState.CONNECTING) return unexpected(context, event);
            return fail(context, event.error);

        case 'SERVICES_DISCOVERED':
            if (state !== TransportState.SERVICE_DISCOVERY) return unexpected(context, event);
            return onServicesDiscovered(context, event.service);

        case 'DISCOVERY_FAILED':
            if (state !== TransportState.SERVICE_DISCOVERY) return unexpected(context, event);
            return fail(context, event.error);

        case 'MTU_CHANGED':
            if (state === TransportState.MTU_NEGOTIATION) return onMtuChanged(context, event.mtu);
            if (context.mtuDegraded) return stay(context, log('debug', `Late MTU ${event.mtu} ignored`));
            return onPeerMtuChanged(context, event.mtu);

        case 'MTU_FAILED':
            if (state === TransportState.MTU_NEGOTIATION) return onMtuUnavailable(context, `failed (${event.error.message})`);
            if (context.mtuDegraded) return stay(context, log('debug', 'Late MTU failure ignored'));
            return unexpected(context, event);

        case 'TIMER_FIRED':
            if (event.timer === 'mtu' && state === TransportState.MTU_NEGOTIATION) {
                return onMtuUnavailable(context, 'timed out');
            }
            if (event.timer === 'linger' && state === TransportState.CLOSING) {
                return shutDown(context, []);
            }
            return stay(context, log('debug', `Stale ${event.timer} timer ignored`));

        case 'CHARACTERISTIC_READ':
            if (event.characteristic === 'ident' && state === TransportState.IDENT_EXCHANGE) {
                return onIdentRead(context, event.value);
            }
            if (event.characteristic === 'l2cap' && state === TransportState.SOCKET_SETUP) {
                return onPsmRead(context, event.value);
            }
            return unexpected(context, event);

        case 'READ_FAILED':
            if (state !== TransportState.IDENT_EXCHANGE && state !== TransportState.SOCKET_SETUP) {
                return unexpected(context, event);
            }
            return fail(context, event.error);

        case 'SOCKET_CONNECTED':
            if (state !== TransportState.SOCKET_SETUP) return unexpected(context, event);
            return open(context, 'l2cap', [log('info', 'L2CAP channel connected')]);

        case 'SOCKET_FAILED':
            if (state !== TransportState.SOCKET_SETUP && state !== TransportState.OPEN) {
                return unexpected(context, event);
            }
            return fail(context, event.error);

        case 'NOTIFICATIONS_ENABLED':
            if (state !== TransportState.NOTIFICATION_SETUP) return unexpected(context, event);
            return onNotificationsEnabled(context, event.characteristic);

        case 'NOTIFICATIONS_FAILED':
            if (state !== TransportState.NOTIFICATION_SETUP) return unexpected(context, event);
            return fail(context, event.error);

        // ----- Data exchange -----

        case 'WRITE_COMPLETE':
            if (state === TransportState.CLOSING) {
                return stay({ ...context, inFlight: null }, log('debug', 'Write completed while closing'));
            }
            return onWriteComplete(context, event);

        case 'WRITE_FAILED':
            if (state === TransportState.CLOSING) {
                return shutDown(context, [{ type: 'error', error: event.error }]);
            }
            if (!context.inFlight) return unexpected(context, event);
            return fail(context, event.error);

        case 'NOTIFICATION':
            if (state === TransportState.CLOSING) {
                return stay(context, log('debug', `Ignoring ${event.characteristic} notification while closing`));
            }
            if (context.mode !== 'gatt') return unexpected(context, event);
            if (event.characteristic === 'server2client'
                && (state === TransportState.OPEN || state === TransportState.HANDSHAKE)) {
                return onServerNotification(context, event.value);
            }
            if (event.characteristic === 'state' && state === TransportState.OPEN) {
                return onStateNotification(context, event.value);
            }
            return unexpected(context, event);

        case 'SOCKET_MESSAGE':
            if (state === TransportState.CLOSING) {
                return stay(context, log('debug', 'Ignoring socket data while closing'));
            }
            if (state !== TransportState.OPEN || context.mode !== 'l2cap') return unexpected(context, event);
            if (event.message.length === 0) {
                return shutDown(context, [{ type: 'peerDisconnected' }]);
            }
            return stay(context, notify({ type: 'messageReceived', message: event.message }));

        case 'LINK_LOST':
            if (state === TransportState.OPEN) {
                return shutDown(context, [{ type: 'peerDisconnected' }]);
            }
            if (state === TransportState.CLOSING) {
                return shutDown(context, []);
            }
            if (SETUP_STATES.includes(state)) {
                return fail(context, MdocError.platform(
                    MdocErrorCode.CONNECTION_LOST,
                    `Connection lost during ${state}`
                ));
            }
            return stay(context, log('debug', `Ignoring LINK_LOST in state ${state}`));
    }
}
