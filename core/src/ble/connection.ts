// core/src/ble/connection.ts
/**
 * BLE connection manager for mdoc central client mode.
 *
 * Drives the transition function in ./transport against a concrete radio. Subclasses
 * implement the protected abstract platform methods (connect, discover, read, write,
 * L2CAP) and report unsolicited platform activity through the protected handle*()
 * methods. Everything else, from setup sequencing and chunking to write pacing and
 * shutdown, is decided by the state machine.
 *
 * Events are processed strictly one at a time. An event raised while another is being
 * handled (for example a platform that completes a write synchronously) is queued and
 * handled afterwards, in order.
 *
 * Teardown sets the inhibit flag before the platform connection is closed; platform
 * callbacks arriving after that point are dropped and no further listener callbacks
 * are made.
 *
 * Usage:
 * ```typescript
 * const connection = new SimulatedGattClient(radio, { serviceUuid });
 * connection.setListener({
 *     onPeerConnected: () => connection.sendMessage(deviceEngagement),
 *     onMessageReceived: message => handle(message),
 *     onPeerDisconnected: () => {},
 *     onTransportSpecificTermination: () => connection.disconnect(),
 *     onError: error => console.error(error)
 * });
 * connection.connect(candidate.deviceId);
 * ```
 */

import {
    type ConnectionConfig,
    type DiscoveredService,
    type NotifyingCharacteristic,
    type StateChangeCallback,
    type TransportListener,
    type TransportMode,
    TransportState,
    createConnectionConfig,
    sameUuid
} from './types';
import {
    type ListenerNotification,
    type ReadableCharacteristic,
    type TimerName,
    type TransportAction,
    type TransportContext,
    type TransportEvent,
    type WritableCharacteristic,
    createTransportContext,
    transition
} from './transport';
import { SocketFrameReader } from './chunking';
import { MdocError, MdocErrorCode, describeError } from '../types/errors';
import { debug, debugBLE } from '../utils/debug';

export interface ConnectionStatistics {
    messagesSent: number;
    messagesReceived: number;
    writesCompleted: number;
    bytesWritten: number;
    notificationsReceived: number;
}

const PLATFORM_EVENTS: ReadonlySet<TransportEvent['type']> = new Set<TransportEvent['type']>([
    'CONNECTED',
    'CONNECT_FAILED',
    'SERVICES_DISCOVERED',
    'DISCOVERY_FAILED',
    'MTU_CHANGED',
    'MTU_FAILED',
    'CHARACTERISTIC_READ',
    'READ_FAILED',
    'NOTIFICATIONS_ENABLED',
    'NOTIFICATIONS_FAILED',
    'SOCKET_CONNECTED',
    'SOCKET_FAILED',
    'WRITE_COMPLETE',
    'WRITE_FAILED',
    'NOTIFICATION',
    'SOCKET_MESSAGE',
    'LINK_LOST',
    'TIMER_FIRED'
]);

function platformError(code: MdocErrorCode, operation: string, cause: unknown): MdocError {
    if (cause instanceof MdocError) {
        return cause;
    }
    return MdocError.platform(code, `${operation} failed: ${describeError(cause)}`, describeError(cause));
}

export abstract class BLEConnectionManager {
    // ===== STATE MACHINE =====
    private context: TransportContext;
    private pendingEvents: TransportEvent[] = [];
    private dispatching = false;
    private inhibitCallbacks = false;

    // ===== RESOURCES =====
    private timers: Map<TimerName, NodeJS.Timeout> = new Map();
    private socketReader = new SocketFrameReader();

    // ===== CALLBACKS =====
    private listener: TransportListener | null;
    private stateCallbacks: Set<StateChangeCallback> = new Set();

    private statistics: ConnectionStatistics = {
        messagesSent: 0,
        messagesReceived: 0,
        writesCompleted: 0,
        bytesWritten: 0,
        notificationsReceived: 0
    };

    protected readonly config: ConnectionConfig;

    constructor(
        config: Partial<ConnectionConfig> & Pick<ConnectionConfig, 'serviceUuid'>,
        listener?: TransportListener
    ) {
        this.config = createConnectionConfig(config);
        this.listener = listener ?? null;
        this.context = createTransportContext(this.config, false);
    }

    // === ABSTRACT PLATFORM-SPECIFIC METHODS ===

    /**
     * Open the link-layer connection to the peripheral
     */
    protected abstract connectToDevice(deviceId: string): Promise<void>;

    /**
     * Resolve the service and list the characteristic UUIDs it exposes
     */
    protected abstract discoverServices(serviceUuid: string): Promise<DiscoveredService>;

    /**
     * Request an ATT MTU; resolves with the MTU actually agreed
     */
    protected abstract requestMtu(mtu: number): Promise<number>;

    protected abstract readCharacteristic(characteristicUuid: string): Promise<Uint8Array>;

    /**
     * Write the CCCD of a characteristic to enable notifications
     */
    protected abstract enableNotifications(characteristicUuid: string): Promise<void>;

    /**
     * Write without splitting; resolves when the platform reports the write complete
     */
    protected abstract writeCharacteristic(characteristicUuid: string, value: Uint8Array): Promise<void>;

    /**
     * Whether the platform can open connection-oriented L2CAP channels
     */
    protected abstract supportsL2CAP(): boolean;

    protected abstract openL2CAPChannel(psm: number): Promise<void>;

    protected abstract writeL2CAP(data: Uint8Array): Promise<void>;

    /**
     * Release the connection and any channel. Must be idempotent.
     */
    protected abstract closeConnection(): Promise<void>;

    /**
     * Optional capability for platforms that keep a stale attribute cache between
     * connections. Does nothing unless overridden.
     */
    protected clearCache(): Promise<void> {
        return Promise.resolve();
    }

    // === PLATFORM CALLBACKS ===

    /**
     * Called by subclasses for every characteristic notification
     */
    protected handleNotification(characteristicUuid: string, value: Uint8Array): void {
        if (this.inhibitCallbacks) return;

        let characteristic: NotifyingCharacteristic;
        if (sameUuid(characteristicUuid, this.config.characteristics.server2client)) {
            characteristic = 'server2client';
        } else if (sameUuid(characteristicUuid, this.config.characteristics.state)) {
            characteristic = 'state';
        } else {
            debug.debug(`Ignoring notification on ${characteristicUuid}`);
            return;
        }

        this.statistics.notificationsReceived++;
        if (characteristic === 'server2client') {
            debugBLE.chunk('in', value);
        }
        this.dispatch({ type: 'NOTIFICATION', characteristic, value });
    }

    /**
     * Called by subclasses with raw bytes read from the L2CAP channel
     */
    protected handleL2CAPData(data: Uint8Array): void {
        if (this.inhibitCallbacks) return;
        for (const message of this.socketReader.push(data)) {
            this.dispatch({ type: 'SOCKET_MESSAGE', message });
        }
    }

    /**
     * Called by subclasses when the link or the L2CAP channel drops
     */
    protected handleLinkLost(): void {
        if (this.inhibitCallbacks) return;
        this.dispatch({ type: 'LINK_LOST' });
    }

    // === PUBLIC API ===

    setListener(listener: TransportListener | null): void {
        this.listener = listener;
    }

    onStateChange(callback: StateChangeCallback): void {
        this.stateCallbacks.add(callback);
    }

    removeStateChangeCallback(callback: StateChangeCallback): void {
        this.stateCallbacks.delete(callback);
    }

    /**
     * Start connecting to a peer found by the scanner
     */
    connect(deviceId: string): void {
        if (this.context.state !== TransportState.IDLE) {
            throw MdocError.precondition(
                MdocErrorCode.INVALID_OPERATION,
                `connect() requires state IDLE, current state is ${this.context.state}`
            );
        }
        this.context = createTransportContext(this.config, this.supportsL2CAP());
        debugBLE.connection('connecting', deviceId);
        this.dispatch({ type: 'CONNECT', deviceId });
    }

    /**
     * Send one application message. An empty message requests shutdown: queued
     * messages are delivered first, then the connection closes.
     */
    sendMessage(message: Uint8Array): void {
        this.assertAcceptingData('sendMessage');
        this.statistics.messagesSent++;
        this.dispatch({ type: 'SEND_MESSAGE', message });
    }

    /**
     * Queue pre-chunked bytes exactly as given (diagnostics)
     */
    write(raw: Uint8Array): void {
        this.assertAcceptingData('write');
        this.dispatch({ type: 'SEND_RAW', value: raw });
    }

    /**
     * Write the end code to the State characteristic. Not available on the L2CAP path,
     * where termination is signalled by closing the channel.
     */
    sendTransportSpecificTermination(): void {
        this.assertAcceptingData('sendTransportSpecificTermination');
        if (this.context.mode !== 'gatt') {
            throw MdocError.precondition(
                MdocErrorCode.INVALID_OPERATION,
                'Transport-specific termination is not supported over L2CAP'
            );
        }
        this.dispatch({ type: 'SEND_TERMINATION' });
    }

    /**
     * Close immediately. No listener callbacks are made after this call.
     */
    disconnect(): void {
        if (this.context.state === TransportState.CLOSED) return;
        this.inhibitCallbacks = true;
        this.dispatch({ type: 'DISCONNECT' });
    }

    getState(): TransportState {
        return this.context.state;
    }

    getMode(): TransportMode | null {
        return this.context.mode;
    }

    getAttributeSize(): number {
        return this.context.attributeSize;
    }

    isMtuDegraded(): boolean {
        return this.context.mtuDegraded;
    }

    getDeviceId(): string | null {
        return this.context.deviceId;
    }

    getStatistics(): ConnectionStatistics {
        return { ...this.statistics };
    }

    private assertAcceptingData(operation: string): void {
        if (this.context.state !== TransportState.OPEN) {
            throw MdocError.precondition(
                MdocErrorCode.INVALID_OPERATION,
                `${operation}() requires an open connection, current state is ${this.context.state}`
            );
        }
        if (this.context.shutdownRequested) {
            throw MdocError.precondition(
                MdocErrorCode.INVALID_OPERATION,
                `${operation}() called after shutdown was requested`
            );
        }
    }

    // === DISPATCH ===

    private dispatch(event: TransportEvent): void {
        if (this.inhibitCallbacks && PLATFORM_EVENTS.has(event.type)) {
            return;
        }
        this.pendingEvents.push(event);
        if (this.dispatching) return;

        this.dispatching = true;
        try {
            let next = this.pendingEvents.shift();
            while (next) {
                this.step(next);
                next = this.pendingEvents.shift();
            }
        } finally {
            this.dispatching = false;
        }
    }

    private step(event: TransportEvent): void {
        if (this.inhibitCallbacks && PLATFORM_EVENTS.has(event.type)) {
            return;
        }
        const previous = this.context.state;
        const { context, actions } = transition(this.context, event);
        this.context = context;

        if (context.state !== previous) {
            debugBLE.connection(`${previous} -> ${context.state}`, context.deviceId ?? undefined);
            this.emitStateChange(context.state, previous);
        }

        for (const action of actions) {
            this.execute(action);
        }
    }

    private execute(action: TransportAction): void {
        switch (action.type) {
            case 'connect':
                this.run(
                    () => this.connectToDevice(action.deviceId),
                    () => ({ type: 'CONNECTED' }),
                    error => ({ type: 'CONNECT_FAILED', error: platformError(MdocErrorCode.CONNECTION_FAILED, 'Connect', error) })
                );
                break;

            case 'discoverServices':
                this.run(
                    () => this.discoverServices(this.config.serviceUuid),
                    service => ({ type: 'SERVICES_DISCOVERED', service }),
                    error => ({ type: 'DISCOVERY_FAILED', error: platformError(MdocErrorCode.SERVICE_NOT_FOUND, 'Service discovery', error) })
                );
                break;

            case 'requestMtu':
                this.run(
                    () => this.requestMtu(action.mtu),
                    mtu => ({ type: 'MTU_CHANGED', mtu }),
                    error => ({ type: 'MTU_FAILED', error: platformError(MdocErrorCode.MTU_NEGOTIATION_FAILED, 'MTU request', error) })
                );
                break;

            case 'startTimer':
                this.startTimer(action.timer, action.delayMs);
                break;

            case 'cancelTimer':
                this.cancelTimer(action.timer);
                break;

            case 'readCharacteristic':
                this.executeRead(action.characteristic);
                break;

            case 'openSocket':
                this.run(
                    () => this.openL2CAPChannel(action.psm),
                    () => ({ type: 'SOCKET_CONNECTED' }),
                    error => ({ type: 'SOCKET_FAILED', error: platformError(MdocErrorCode.SOCKET_FAILED, 'L2CAP connect', error) })
                );
                break;

            case 'enableNotifications': {
                const characteristic = action.characteristic;
                this.run(
                    () => this.enableNotifications(this.config.characteristics[characteristic]),
                    () => ({ type: 'NOTIFICATIONS_ENABLED', characteristic }),
                    error => ({
                        type: 'NOTIFICATIONS_FAILED',
                        characteristic,
                        error: platformError(MdocErrorCode.NOTIFICATION_SETUP_FAILED, `Enabling ${characteristic} notifications`, error)
                    })
                );
                break;
            }

            case 'writeCharacteristic':
                this.executeWrite(action.characteristic, action.value);
                break;

            case 'writeSocket': {
                const length = action.value.length;
                this.run(
                    () => this.writeL2CAP(action.value),
                    () => this.writeCompleted(length),
                    error => ({ type: 'WRITE_FAILED', error: platformError(MdocErrorCode.WRITE_FAILED, 'L2CAP write', error) })
                );
                break;
            }

            case 'notify':
                this.deliver(action.notification);
                break;

            case 'log':
                if (action.level === 'warn') {
                    debug.warn(action.message);
                } else if (action.level === 'info') {
                    debug.ble(action.message);
                } else {
                    debug.debug(action.message);
                }
                break;

            case 'teardown':
                this.teardown();
                break;
        }
    }

    private executeRead(characteristic: ReadableCharacteristic): void {
        const uuid = this.config.characteristics[characteristic];
        if (uuid === undefined) {
            this.dispatch({
                type: 'READ_FAILED',
                characteristic,
                error: MdocError.protocol(MdocErrorCode.CHARACTERISTIC_NOT_FOUND, `No ${characteristic} characteristic configured`)
            });
            return;
        }
        this.run(
            () => this.readCharacteristic(uuid),
            value => ({ type: 'CHARACTERISTIC_READ', characteristic, value }),
            error => ({ type: 'READ_FAILED', characteristic, error: platformError(MdocErrorCode.READ_FAILED, `Reading ${characteristic}`, error) })
        );
    }

    private executeWrite(characteristic: WritableCharacteristic, value: Uint8Array): void {
        if (characteristic === 'client2server') {
            debugBLE.chunk('out', value);
        }
        this.run(
            () => this.writeCharacteristic(this.config.characteristics[characteristic], value),
            () => this.writeCompleted(value.length),
            error => ({ type: 'WRITE_FAILED', error: platformError(MdocErrorCode.WRITE_FAILED, `Writing ${characteristic}`, error) })
        );
    }

    private writeCompleted(length: number): TransportEvent {
        this.statistics.writesCompleted++;
        this.statistics.bytesWritten += length;
        return { type: 'WRITE_COMPLETE' };
    }

    /**
     * Start a platform operation and turn its settlement into an event
     */
    private run<T>(
        operation: () => Promise<T>,
        onSuccess: (value: T) => TransportEvent,
        onFailure: (error: unknown) => TransportEvent
    ): void {
        let pending: Promise<T>;
        try {
            pending = operation();
        } catch (error) {
            pending = Promise.reject(error);
        }
        void pending.then(
            value => this.dispatch(onSuccess(value)),
            (error: unknown) => this.dispatch(onFailure(error))
        );
    }

    private startTimer(timer: TimerName, delayMs: number): void {
        this.cancelTimer(timer);
        this.timers.set(timer, setTimeout(() => {
            this.timers.delete(timer);
            this.dispatch({ type: 'TIMER_FIRED', timer });
        }, delayMs));
    }

    private cancelTimer(timer: TimerName): void {
        const handle = this.timers.get(timer);
        if (handle !== undefined) {
            clearTimeout(handle);
            this.timers.delete(timer);
        }
    }

    private deliver(notification: ListenerNotification): void {
        if (notification.type === 'messageReceived') {
            this.statistics.messagesReceived++;
        }
        if (notification.type === 'error') {
            debugBLE.error('transport', notification.error);
        }
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
            debug.error(`Error in transport listener (${notification.type})`, error);
        }
    }

    private emitStateChange(state: TransportState, previous: TransportState): void {
        if (this.inhibitCallbacks) return;
        for (const callback of this.stateCallbacks) {
            try {
                callback(state, previous);
            } catch (error) {
                debug.error('Error in state change callback', error);
            }
        }
    }

    private teardown(): void {
        this.inhibitCallbacks = true;
        for (const timer of Array.from(this.timers.keys())) {
            this.cancelTimer(timer);
        }
        this.socketReader = new SocketFrameReader();
        debugBLE.connection('teardown', this.context.deviceId ?? undefined);

        void this.clearCache()
            .then(() => this.closeConnection())
            .catch((error: unknown) => debugBLE.error('close', error));
    }
}
