// src/ble/SimulatedRadio.ts
import { EventEmitter } from 'events';
import { MdocError, MdocErrorCode, debug, sameUuid } from '@mdoc-proximity/core';

/**
 * In-process stand-in for the air interface. Peripherals register an endpoint and
 * advertise; centrals scan, connect, and then talk to the peripheral through the
 * radio. Every delivery is asynchronous (one timer tick, plus optional latency) and
 * deliveries are FIFO, the way a real stack reports completions.
 *
 * Events:
 *   'advertisement' (Advertisement)
 *   'link-up'       (deviceId, centralId)
 *   'link-down'     (deviceId)
 */

export interface Advertisement {
    deviceId: string;
    rssi: number;
    serviceUuids: string[];
}

export interface ServiceDescription {
    serviceUuid: string;
    characteristics: string[];
}

/**
 * Callbacks into a peripheral (GATT server) implementation
 */
export interface PeripheralEndpoint {
    readonly deviceId: string;
    describe(): ServiceDescription;
    onCentralConnected(centralId: string): void;
    /** Agreed MTU, or null when the peripheral never answers MTU requests */
    onMtuRequest(mtu: number): number | null;
    onRead(characteristicUuid: string): Uint8Array | null;
    onWrite(characteristicUuid: string, value: Uint8Array): void;
    onCentralDisconnected(): void;
    /** Whether a channel may be opened on `psm` */
    onL2CAPOpen(psm: number): boolean;
    onL2CAPData(data: Uint8Array): void;
}

/**
 * Callbacks into a central (GATT client) implementation
 */
export interface CentralEndpoint {
    readonly centralId: string;
    onNotification(characteristicUuid: string, value: Uint8Array): void;
    onL2CAPData(data: Uint8Array): void;
    onLinkLost(): void;
}

export type RadioOperation =
    | 'scan'
    | 'connect'
    | 'discover'
    | 'mtu'
    | 'read'
    | 'write'
    | 'subscribe'
    | 'notify'
    | 'l2cap'
    | 'l2cap-write';

export interface SimulatedRadioOptions {
    /** Extra delay applied to every delivery */
    latencyMs?: number;
}

interface Link {
    central: CentralEndpoint;
    peripheral: PeripheralEndpoint;
    subscriptions: Set<string>;
    l2capOpen: boolean;
}

const FIRST_DYNAMIC_PSM = 0x0080;

export class SimulatedRadio extends EventEmitter {
    private readonly latencyMs: number;
    private advertisers: Map<string, Advertisement> = new Map();
    private peripherals: Map<string, PeripheralEndpoint> = new Map();
    private links: Map<string, Link> = new Map();
    private failures: Map<RadioOperation, string[]> = new Map();
    private nextPsm = FIRST_DYNAMIC_PSM;

    constructor(options: SimulatedRadioOptions = {}) {
        super();
        this.latencyMs = options.latencyMs ?? 0;
    }

    // ===== FAULT INJECTION =====

    /**
     * Make the next `operation` fail with `message`
     */
    failNext(operation: RadioOperation, message: string = `Simulated ${operation} failure`): void {
        const queue = this.failures.get(operation) ?? [];
        queue.push(message);
        this.failures.set(operation, queue);
    }

    /**
     * Drop the link as if the peer went out of range; both sides are told
     */
    dropLink(deviceId: string): void {
        const link = this.links.get(deviceId);
        if (!link) return;
        this.links.delete(deviceId);
        this.emit('link-down', deviceId);
        this.schedule(() => link.central.onLinkLost());
        this.schedule(() => link.peripheral.onCentralDisconnected());
    }

    private takeFailure(operation: RadioOperation): Error | null {
        const queue = this.failures.get(operation);
        const message = queue?.shift();
        return message === undefined ? null : new Error(message);
    }

    // ===== ADVERTISING AND SCANNING =====

    registerPeripheral(endpoint: PeripheralEndpoint): void {
        this.peripherals.set(endpoint.deviceId, endpoint);
    }

    unregisterPeripheral(deviceId: string): void {
        this.peripherals.delete(deviceId);
        this.advertisers.delete(deviceId);
    }

    advertise(advertisement: Advertisement): void {
        this.advertisers.set(advertisement.deviceId, advertisement);
        this.schedule(() => {
            if (this.advertisers.has(advertisement.deviceId)) {
                this.emit('advertisement', advertisement);
            }
        });
    }

    stopAdvertising(deviceId: string): void {
        this.advertisers.delete(deviceId);
    }

    /**
     * Subscribe to advertisements. Current advertisers are reported right away, later
     * ones as they start. Returns the unsubscribe function.
     */
    startScan(handler: (advertisement: Advertisement) => void): Promise<() => void> {
        const failure = this.takeFailure('scan');
        if (failure) {
            return Promise.reject(failure);
        }

        this.on('advertisement', handler);
        for (const advertisement of this.advertisers.values()) {
            this.schedule(() => {
                if (this.listeners('advertisement').includes(handler)) {
                    handler(advertisement);
                }
            });
        }
        return Promise.resolve(() => {
            this.off('advertisement', handler);
        });
    }

    // ===== CENTRAL OPERATIONS =====

    connect(deviceId: string, central: CentralEndpoint): Promise<void> {
        return this.operation('connect', () => {
            const peripheral = this.peripherals.get(deviceId);
            if (!peripheral) {
                throw MdocError.platform(MdocErrorCode.CONNECTION_FAILED, `No peripheral ${deviceId} in range`);
            }
            if (this.links.has(deviceId)) {
                throw MdocError.platform(MdocErrorCode.CONNECTION_FAILED, `Peripheral ${deviceId} already has a central`);
            }
            this.links.set(deviceId, { central, peripheral, subscriptions: new Set(), l2capOpen: false });
            this.emit('link-up', deviceId, central.centralId);
            peripheral.onCentralConnected(central.centralId);
        });
    }

    discover(deviceId: string): Promise<ServiceDescription> {
        return this.operation('discover', () => this.requireLink(deviceId).peripheral.describe());
    }

    /**
     * Resolves with the agreed MTU; never settles when the peripheral ignores the request
     */
    requestMtu(deviceId: string, mtu: number): Promise<number> {
        return new Promise<number>((resolve, reject) => {
            this.schedule(() => {
                const failure = this.takeFailure('mtu');
                if (failure) {
                    reject(failure);
                    return;
                }
                const link = this.links.get(deviceId);
                if (!link) {
                    reject(this.notConnected(deviceId));
                    return;
                }
                const agreed = link.peripheral.onMtuRequest(mtu);
                if (agreed !== null) {
                    resolve(agreed);
                } else {
                    debug.debug(`Peripheral ${deviceId} ignored MTU request`);
                }
            });
        });
    }

    read(deviceId: string, characteristicUuid: string): Promise<Uint8Array> {
        return this.operation('read', () => {
            const value = this.requireLink(deviceId).peripheral.onRead(characteristicUuid);
            if (value === null) {
                throw MdocError.platform(MdocErrorCode.READ_FAILED, `Characteristic ${characteristicUuid} is not readable`);
            }
            return value.slice();
        });
    }

    write(deviceId: string, characteristicUuid: string, value: Uint8Array): Promise<void> {
        const copy = value.slice();
        return this.operation('write', () => {
            this.requireLink(deviceId).peripheral.onWrite(characteristicUuid, copy);
        });
    }

    subscribe(deviceId: string, characteristicUuid: string): Promise<void> {
        return this.operation('subscribe', () => {
            const link = this.requireLink(deviceId);
            if (!link.peripheral.describe().characteristics.some(uuid => sameUuid(uuid, characteristicUuid))) {
                throw MdocError.platform(MdocErrorCode.NOTIFICATION_SETUP_FAILED, `No characteristic ${characteristicUuid}`);
            }
            link.subscriptions.add(characteristicUuid.toLowerCase());
        });
    }

    openL2CAP(deviceId: string, psm: number): Promise<void> {
        return this.operation('l2cap', () => {
            const link = this.requireLink(deviceId);
            if (!link.peripheral.onL2CAPOpen(psm)) {
                throw MdocError.platform(MdocErrorCode.SOCKET_FAILED, `Nothing listening on PSM ${psm}`);
            }
            link.l2capOpen = true;
        });
    }

    sendL2CAPToPeripheral(deviceId: string, data: Uint8Array): Promise<void> {
        const copy = data.slice();
        return this.operation('l2cap-write', () => {
            const link = this.requireChannel(deviceId);
            link.peripheral.onL2CAPData(copy);
        });
    }

    /**
     * Central side close; the peripheral learns about it on the next tick
     */
    disconnect(deviceId: string): Promise<void> {
        const link = this.links.get(deviceId);
        if (!link) return Promise.resolve();
        this.links.delete(deviceId);
        this.emit('link-down', deviceId);
        this.schedule(() => link.peripheral.onCentralDisconnected());
        return Promise.resolve();
    }

    // ===== PERIPHERAL OPERATIONS =====

    allocatePsm(): number {
        return this.nextPsm++;
    }

    notify(deviceId: string, characteristicUuid: string, value: Uint8Array): Promise<void> {
        const copy = value.slice();
        return this.operation('notify', () => {
            const link = this.requireLink(deviceId);
            if (!link.subscriptions.has(characteristicUuid.toLowerCase())) {
                throw MdocError.platform(MdocErrorCode.WRITE_FAILED, `Central is not subscribed to ${characteristicUuid}`);
            }
            link.central.onNotification(characteristicUuid, copy);
        });
    }

    sendL2CAPToCentral(deviceId: string, data: Uint8Array): Promise<void> {
        const copy = data.slice();
        return this.operation('l2cap-write', () => {
            this.requireChannel(deviceId).central.onL2CAPData(copy);
        });
    }

    /**
     * Peripheral side close; the central sees the link drop
     */
    disconnectCentral(deviceId: string): Promise<void> {
        const link = this.links.get(deviceId);
        if (!link) return Promise.resolve();
        this.links.delete(deviceId);
        this.emit('link-down', deviceId);
        this.schedule(() => link.central.onLinkLost());
        return Promise.resolve();
    }

    // ===== STATUS =====

    isLinked(deviceId: string): boolean {
        return this.links.has(deviceId);
    }

    isAdvertising(deviceId: string): boolean {
        return this.advertisers.has(deviceId);
    }

    // ===== INTERNALS =====

    private schedule(delivery: () => void): void {
        setTimeout(() => {
            try {
                delivery();
            } catch (error) {
                debug.error('Simulated radio delivery failed', error);
            }
        }, this.latencyMs);
    }

    private operation<T>(name: RadioOperation, perform: () => T): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            setTimeout(() => {
                const failure = this.takeFailure(name);
                if (failure) {
                    reject(failure);
                    return;
                }
                try {
                    resolve(perform());
                } catch (error) {
                    reject(error);
                }
            }, this.latencyMs);
        });
    }

    private requireLink(deviceId: string): Link {
        const link = this.links.get(deviceId);
        if (!link) {
            throw this.notConnected(deviceId);
        }
        return link;
    }

    private requireChannel(deviceId: string): Link {
        const link = this.requireLink(deviceId);
        if (!link.l2capOpen) {
            throw MdocError.platform(MdocErrorCode.SOCKET_FAILED, `No L2CAP channel to ${deviceId}`);
        }
        return link;
    }

    private notConnected(deviceId: string): MdocError {
        return MdocError.platform(MdocErrorCode.CONNECTION_LOST, `Not connected to ${deviceId}`);
    }
}
