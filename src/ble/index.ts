/**
 * Node.js host for the mdoc proximity core: the simulated radio and the concrete
 * scanner, client and server classes that run on it, plus factory helpers.
 */

import {
    BLEManager,
    BLE_CONFIG,
    EcCurve,
    EcKeyPair,
    debug,
    deriveBleIdent,
    type CborValue,
    type ConnectionConfig
} from '@mdoc-proximity/core';
import { SimulatedRadio } from './SimulatedRadio';
import { SimulatedBLEScanner } from './SimulatedBLEScanner';
import { SimulatedGattClient, type SimulatedClientOptions } from './SimulatedGattClient';

export { SimulatedRadio } from './SimulatedRadio';
export type {
    Advertisement,
    ServiceDescription,
    PeripheralEndpoint,
    CentralEndpoint,
    RadioOperation,
    SimulatedRadioOptions
} from './SimulatedRadio';
export { SimulatedBLEScanner } from './SimulatedBLEScanner';
export { SimulatedGattClient } from './SimulatedGattClient';
export type { SimulatedClientOptions } from './SimulatedGattClient';
export { SimulatedGattServer } from './SimulatedGattServer';
export type { SimulatedServerOptions } from './SimulatedGattServer';

export interface MdocSessionOptions {
    serviceUuid: string;
    deviceEngagement: Uint8Array;
    /** Generated on P-256 when omitted */
    eDeviceKey?: EcKeyPair;
    handover?: CborValue;
    scanDurationMs?: number;
    connection?: Partial<Omit<ConnectionConfig, 'serviceUuid'>>;
    client?: SimulatedClientOptions;
}

export interface MdocSession {
    manager: BLEManager;
    scanner: SimulatedBLEScanner;
    connection: SimulatedGattClient;
    eDeviceKey: EcKeyPair;
}

/**
 * Apply MDOC_LOG / MDOC_LOG_LEVEL / NO_COLOR from the environment
 */
export function configureLogging(env: Record<string, string | undefined> = process.env): void {
    debug.configureFromEnv(env);
}

/**
 * Wire an mdoc-side session manager onto the simulated radio. The connection
 * checks the Ident characteristic against the value derived from the device key.
 */
export function createMdocSession(radio: SimulatedRadio, options: MdocSessionOptions): MdocSession {
    const eDeviceKey = options.eDeviceKey ?? EcKeyPair.generate(EcCurve.P256);
    const scanner = new SimulatedBLEScanner(radio);
    const connection = new SimulatedGattClient(radio, {
        ...options.connection,
        serviceUuid: options.serviceUuid,
        expectedIdent: deriveBleIdent(eDeviceKey.publicKey)
    }, options.client);

    const manager = new BLEManager(scanner, connection, {
        serviceUuid: options.serviceUuid,
        deviceEngagement: options.deviceEngagement,
        eDeviceKey,
        handover: options.handover,
        scanDurationMs: options.scanDurationMs ?? BLE_CONFIG.SCAN_DURATION
    });

    return { manager, scanner, connection, eDeviceKey };
}
