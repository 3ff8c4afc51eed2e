// core/src/ble/server.ts
/**
 * Reader-side GATT server for mdoc central client mode.
 *
 * The reader advertises the service and hosts the State, Client2Server and
 * Server2Client characteristics (plus Ident and, when L2CAP is available, the PSM
 * characteristic). The mdoc connects as central, subscribes to Server2Client and
 * State, then writes 0x01 to State. From then on Client2Server carries chunks from
 * the mdoc and Server2Client notifications carry chunks back.
 *
 * Subclasses implement advertising, notifications and the L2CAP listener, and report
 * central activity through the protected handle*() methods.
 */

import {
    BLE_CONFIG,
    type CharacteristicUuids,
    DEFAULT_CHARACTERISTICS,
    type StateChangeCallback,
    type TransportListener,
    type TransportMode,
    sameUuid
} from './types';
import {
    ChunkDecoder,
    SHUTDOWN_CHUNK,
    SocketFrameReader,
    attributeSizeForMtu,
    encodeChunks,
    frameSocketMessage
} from './chunking';
import type { ListenerNotification } from './transport';
import { MdocError, MdocErrorCode, describeError } from '../types/errors';
import { bytesToHex } from '../utils/bytes';
import { debug, debugBLE } from '../utils/debug';

export enum ServerState {
    IDLE = 'IDLE',
    ADVERTISING = 'ADVERTISING',
    CONNECTED = 'CONNECTED',
    OPEN = 'OPEN',
    CLOSING = 'CLOSING',
    CLOSED = 'CLOSED'
}

export interface ServerConfig {
    serviceUuid: string;
    characteristics: CharacteristicUuids;
    /** Value served on the Ident characteristic */
    ident?: Uint8Array;
    lingerDelayMs: number;
    useL2CAP: boolean;
}

export function createServerConfig(
    config: Partial<ServerConfig> & Pick<ServerConfig, 'serviceUuid'>
): ServerConfig {
    return {
        characteristics: DEFAULT_CHARACTERISTICS,
        lingerDelayMs: BLE_CONFIG.LINGER_DELAY,
        useL2CAP: false,
        ...config
    };
}

interface OutboundNotification {
    kind: 'chunk' | 'sentinel' | 'state' | 'close';
    value: Uint8Array;
}

export abstract class GattServerTransport {
    private state: ServerState = ServerState.IDLE;
    private mode: TransportMode | null = null;
    private centralId: string | null = null;
    private attributeSize: number = BLE_CONFIG.DEFAULT_ATTRIBUTE_SIZE;
    private psm: number | null = null;

    private decoder = new ChunkDecoder();
    private socketReader = new SocketFrameReader();
    private outbound: OutboundNotification[] = [];
    private inFlight: boolean = false;
    private shutdownRequested: boolean = false;
    private inhibitCallbacks: boolean = false;
    private lingerTimer?: NodeJS.Timeout;

    private listener: TransportListener | null;
    private stateCallbacks: Set<StateChangeCallback<ServerState>> = new Set();

    protected readonly config: ServerConfig;

    constructor(
        config: Partial<ServerConfig> & Pick<ServerConfig, 'serviceUuid'>,
        listener?: TransportListener
    ) {
        this.config = createServerConfig(config);
        this.listener = listener ?? null;
    }

    // === ABSTRACT PLATFORM-SPECIFIC METHODS ===

    protected abstract startAdvertising(serviceUuid: string): Promise<void>;

    protected abstract stopAdvertising(): Promise<void>;

    /**
     * Send one notification to the subscribed central; resolves once it has been sent
     */
    protected abstract sendNotification(characteristicUuid: string, value: Uint8Array): Promise<void>;

    protected abstract supportsL2CAP(): boolean;

    /**
     * Open an L2CAP listener and resolve with its PSM
     */
    protected abstract listenL2CAP(): Promise<number>;

    protected abstract writeL2CAP(data: Uint8Array): Promise<void>;

    /**
     * Drop the central and close any L2CAP channel. Must be idempotent.
     */
    protected abstract disconnectCentral(): Promise<void>;

    // === PUBLIC API ===

    setListener(listener: TransportListener | null): void {
        this.listener = listener;
    }

    onStateChange(callback: StateChangeCallback<ServerState>): void {
        this.stateCallbacks.add(callback);
    }

    removeStateChangeCallback(callback: StateChangeCallback<ServerState>): void {
        this.stateCallbacks.delete(callback);
    }

    /**
     * Open the L2CAP listener (when enabled) and start advertising
     */
    async start(): Promise<void> {
        if (this.state !== ServerState.IDLE) {
            throw MdocError.precondition(
                MdocErrorCode.INVALID_OPERATION,
                `start() requires state IDLE, current state is ${this.state}`
            );
        }

        try {
            if (this.config.useL2CAP && this.supportsL2CAP()) {
                this.psm = await this.listenL2CAP();
                debug.ble(`L2CAP listener on PSM ${this.psm}`);
            }
            await this.startAdvertising(this.config.serviceUuid);
        } catch (error) {
            throw MdocError.platform(
                MdocErrorCode.ADVERTISING_FAILED,
                `Failed to start GATT server: ${describeError(error)}`,
                describeError(error)
            );
        }

        this.setState(ServerState.ADVERTISING);
    }

    /**
     * Send one message to the mdoc. An empty message drains the queue, then closes
     * after the linger delay.
     */
    sendMessage(message: Uint8Array): void {
        this.assertAcceptingData('sendMessage');

        if (this.mode === 'l2cap') {
            if (message.length === 0) {
                this.shutdownRequested = true;
                this.outbound.push({ kind: 'close', value: message });
            } else {
                this.outbound.push({ kind: 'chunk', value: frameSocketMessage(message) });
            }
        } else if (message.length === 0) {
            this.shutdownRequested = true;
            this.outbound.push({ kind: 'sentinel', value: SHUTDOWN_CHUNK.slice() });
        } else {
            for (const chunk of encodeChunks(message, this.attributeSize - 1)) {
                this.outbound.push({ kind: 'chunk', value: chunk });
            }
        }
        this.pump();
    }

    /**
     * Notify 0x02 on the State characteristic
     */
    sendTransportSpecificTermination(): void {
        this.assertAcceptingData('sendTransportSpecificTermination');
        if (this.mode !== 'gatt') {
            throw MdocError.precondition(
                MdocErrorCode.INVALID_OPERATION,
                'Transport-specific termination is not supported over L2CAP'
            );
        }
        this.outbound.push({ kind: 'state', value: Uint8Array.of(BLE_CONFIG.STATE_END) });
        this.pump();
    }

    /**
     * Stop immediately; no listener callbacks are made after this call
     */
    stop(): void {
        if (this.state === ServerState.CLOSED) return;
        this.inhibitCallbacks = true;
        this.teardown();
    }

    getState(): ServerState {
        return this.state;
    }

    getMode(): TransportMode | null {
        return this.mode;
    }

    getAttributeSize(): number {
        return this.attributeSize;
    }

    getCentralId(): string | null {
        return this.centralId;
    }

    getPsm(): number | null {
        return this.psm;
    }

    // === PLATFORM CALLBACKS ===

    protected handleCentralConnected(deviceId: string): void {
        if (this.inhibitCallbacks) return;
        if (this.state !== ServerState.ADVERTISING) {
            debug.warn(`Ignoring central ${deviceId} in state ${this.state}`);
            return;
        }
        this.centralId = deviceId;
        debugBLE.connection('central connected', deviceId);
        this.setState(ServerState.CONNECTED);
    }

    protected handleMtuChanged(mtu: number): void {
        if (this.inhibitCallbacks) return;
        this.attributeSize = attributeSizeForMtu(mtu);
        debug.ble(`MTU ${mtu}, attribute size ${this.attributeSize}`);
    }

    /**
     * Value for a read of `characteristicUuid`, or null when it is not readable
     */
    protected handleCharacteristicRead(characteristicUuid: string): Uint8Array | null {
        const { ident, l2cap } = this.config.characteristics;
        if (ident !== undefined && sameUuid(characteristicUuid, ident)) {
            return this.config.ident ?? null;
        }
        if (l2cap !== undefined && sameUuid(characteristicUuid, l2cap) && this.psm !== null) {
            return Uint8Array.of((this.psm >> 8) & 0xff, this.psm & 0xff);
        }
        return null;
    }

    /**
     * UUIDs of the characteristics the service currently exposes
     */
    protected hostedCharacteristics(): string[] {
        const { state, client2server, server2client, ident, l2cap } = this.config.characteristics;
        const hosted = [state, client2server, server2client];
        if (ident !== undefined && this.config.ident !== undefined) hosted.push(ident);
        if (l2cap !== undefined && this.psm !== null) hosted.push(l2cap);
        return hosted;
    }

    protected handleCharacteristicWrite(characteristicUuid: string, value: Uint8Array): void {
        if (this.inhibitCallbacks) return;
        const { state, client2server } = this.config.characteristics;

        if (sameUuid(characteristicUuid, state)) {
            this.onStateWrite(value);
        } else if (sameUuid(characteristicUuid, client2server)) {
            this.onClientChunk(value);
        } else {
            debug.debug(`Ignoring write to ${characteristicUuid}`);
        }
    }

    protected handleL2CAPConnected(): void {
        if (this.inhibitCallbacks) return;
        if (this.state !== ServerState.CONNECTED && this.state !== ServerState.ADVERTISING) {
            this.fail(MdocError.protocol(MdocErrorCode.UNEXPECTED_EVENT, `L2CAP channel opened in state ${this.state}`));
            return;
        }
        this.open('l2cap');
    }

    protected handleL2CAPData(data: Uint8Array): void {
        if (this.inhibitCallbacks) return;
        if (this.state === ServerState.CLOSING) return;
        if (this.state !== ServerState.OPEN || this.mode !== 'l2cap') {
            this.fail(MdocError.protocol(MdocErrorCode.UNEXPECTED_EVENT, `L2CAP data in state ${this.state}`));
            return;
        }
        for (const message of this.socketReader.push(data)) {
            if (message.length === 0) {
                this.shutDown({ type: 'peerDisconnected' });
                return;
            }
            this.deliverMessage(message);
        }
    }

    protected handleCentralDisconnected(): void {
        if (this.inhibitCallbacks) return;
        switch (this.state) {
            case ServerState.OPEN:
                this.shutDown({ type: 'peerDisconnected' });
                break;
            case ServerState.CLOSING:
                this.shutDown();
                break;
            case ServerState.CONNECTED:
                this.fail(MdocError.platform(MdocErrorCode.CONNECTION_LOST, 'Central disconnected before the transport opened'));
                break;
            default:
                debug.debug(`Ignoring disconnect in state ${this.state}`);
        }
    }

    // === INBOUND ===

    private onStateWrite(value: Uint8Array): void {
        if (value.length === 1 && value[0] === BLE_CONFIG.STATE_START) {
            if (this.state !== ServerState.CONNECTED) {
                this.fail(MdocError.protocol(MdocErrorCode.UNEXPECTED_EVENT, `Start signal in state ${this.state}`));
                return;
            }
            this.open('gatt');
            return;
        }
        if (value.length === 1 && value[0] === BLE_CONFIG.STATE_END && this.state === ServerState.OPEN) {
            this.notifyListener({ type: 'transportSpecificTermination' });
            return;
        }
        this.fail(MdocError.protocol(
            MdocErrorCode.INVALID_STATE_VALUE,
            `Unexpected State characteristic value ${bytesToHex(value)}`
        ));
    }

    private onClientChunk(chunk: Uint8Array): void {
        if (this.state === ServerState.CLOSING) return;
        if (this.state !== ServerState.OPEN || this.mode !== 'gatt') {
            this.fail(MdocError.protocol(
                MdocErrorCode.UNEXPECTED_EVENT,
                `Client2Server write in state ${this.state}`
            ));
            return;
        }

        debugBLE.chunk('in', chunk);
        const result = this.decoder.push(chunk);
        if (!result.ok) {
            this.fail(result.error);
            return;
        }
        switch (result.value.type) {
            case 'pending':
                break;
            case 'message':
                this.deliverMessage(result.value.message);
                break;
            case 'shutdown':
                this.shutDown({ type: 'peerDisconnected' });
                break;
        }
    }

    private open(mode: TransportMode): void {
        this.mode = mode;
        this.setState(ServerState.OPEN);
        this.notifyListener({ type: 'peerConnected' });
    }

    private deliverMessage(message: Uint8Array): void {
        this.notifyListener({ type: 'messageReceived', message });
    }

    // === OUTBOUND ===

    private assertAcceptingData(operation: string): void {
        if (this.state !== ServerState.OPEN) {
            throw MdocError.precondition(
                MdocErrorCode.INVALID_OPERATION,
                `${operation}() requires an open connection, current state is ${this.state}`
            );
        }
        if (this.shutdownRequested) {
            throw MdocError.precondition(
                MdocErrorCode.INVALID_OPERATION,
                `${operation}() called after shutdown was requested`
            );
        }
    }

    private pump(): void {
        if (this.inFlight || this.state !== ServerState.OPEN) return;
        const next = this.outbound.shift();
        if (!next) return;

        if (next.kind === 'close') {
            this.startLinger();
            return;
        }

        this.inFlight = true;
        let pending: Promise<void>;
        try {
            pending = this.mode === 'l2cap'
                ? this.writeL2CAP(next.value)
                : this.sendNotification(this.notificationTarget(next), next.value);
        } catch (error) {
            pending = Promise.reject(error);
        }

        void pending.then(
            () => {
                this.inFlight = false;
                if (this.inhibitCallbacks) return;
                if (next.kind === 'sentinel') {
                    this.startLinger();
                    return;
                }
                this.pump();
            },
            (error: unknown) => {
                this.inFlight = false;
                if (this.inhibitCallbacks) return;
                this.fail(MdocError.platform(
                    MdocErrorCode.WRITE_FAILED,
                    `Notification failed: ${describeError(error)}`,
                    describeError(error)
                ));
            }
        );
    }

    private notificationTarget(item: OutboundNotification): string {
        return item.kind === 'state'
            ? this.config.characteristics.state
            : this.config.characteristics.server2client;
    }

    private startLinger(): void {
        this.outbound = [];
        this.setState(ServerState.CLOSING);
        debug.ble(`Closing after ${this.config.lingerDelayMs}ms linger`);
        this.lingerTimer = setTimeout(() => {
            this.lingerTimer = undefined;
            this.shutDown();
        }, this.config.lingerDelayMs);
    }

    // === SHUTDOWN ===

    private fail(error: MdocError): void {
        debugBLE.error('server', error);
        this.shutDown({ type: 'error', error });
    }

    private shutDown(notification?: ListenerNotification): void {
        if (notification) {
            this.notifyListener(notification);
        }
        this.teardown();
    }

    private teardown(): void {
        const wasActive = this.state !== ServerState.IDLE && this.state !== ServerState.CLOSED;
        if (this.lingerTimer) {
            clearTimeout(this.lingerTimer);
            this.lingerTimer = undefined;
        }
        this.outbound = [];
        this.decoder.reset();
        this.socketReader = new SocketFrameReader();
        this.setState(ServerState.CLOSED);
        this.inhibitCallbacks = true;

        if (!wasActive) return;
        void this.stopAdvertising()
            .then(() => this.disconnectCentral())
            .catch((error: unknown) => debugBLE.error('server close', error));
    }

    // === CALLBACKS ===

    private notifyListener(notification: ListenerNotification): void {
        if (this.inhibitCallbacks || !this.listener) return;
        const listener = this.listener;
        try {
            switch (notification.type) {
                case 'peerConnected':
                    listener.onPeerConnected();
                    break;
                case 'messageReceived':
                    listener.onMessageReceived(notification.message);
                    break;
                case 'peerDisconnected':
                    listener.onPeerDisconnected();
                    break;
                case 'transportSpecificTermination':
                    listener.onTransportSpecificTermination();
                    break;
                case 'error':
                    listener.onError(notification.error);
                    break;
            }
        } catch (error) {
            debug.error(`Error in server listener (${notification.type})`, error);
        }
    }

    private setState(state: ServerState): void {
        const previous = this.state;
        if (previous === state) return;
        this.state = state;
        if (this.inhibitCallbacks) return;
        for (const callback of this.stateCallbacks) {
            try {
                callback(state, previous);
            } catch (error) {
                debug.error('Error in state change callback', error);
            }
        }
    }
}
