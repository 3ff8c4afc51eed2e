// src/ble/SimulatedGattServer.ts
import {
    BLE_CONFIG,
    GattServerTransport,
    type ServerConfig,
    type TransportListener
} from '@mdoc-proximity/core';
import { type PeripheralEndpoint, SimulatedRadio } from './SimulatedRadio';

export interface SimulatedServerOptions {
    rssi?: number;
    /** Largest MTU the peripheral agrees to; null to ignore MTU requests */
    maxMtu?: number | null;
    /** Whether the peripheral can listen for L2CAP channels */
    l2cap?: boolean;
}

/**
 * Reader-side GATT server on the simulated radio
 */
export class SimulatedGattServer extends GattServerTransport {
    private readonly radio: SimulatedRadio;
    private readonly deviceId: string;
    private readonly rssi: number;
    private readonly maxMtu: number | null;
    private readonly l2capCapable: boolean;
    private readonly endpoint: PeripheralEndpoint;

    constructor(
        radio: SimulatedRadio,
        deviceId: string,
        config: Partial<ServerConfig> & Pick<ServerConfig, 'serviceUuid'>,
        options: SimulatedServerOptions = {},
        listener?: TransportListener
    ) {
        super(config, listener);
        this.radio = radio;
        this.deviceId = deviceId;
        this.rssi = options.rssi ?? -60;
        this.maxMtu = options.maxMtu === undefined ? BLE_CONFIG.MTU_REQUEST : options.maxMtu;
        this.l2capCapable = options.l2cap ?? false;
        this.endpoint = {
            deviceId,
            describe: () => ({
                serviceUuid: this.config.serviceUuid,
                characteristics: this.hostedCharacteristics()
            }),
            onCentralConnected: centralId => this.handleCentralConnected(centralId),
            onMtuRequest: mtu => {
                if (this.maxMtu === null) return null;
                const agreed = Math.min(mtu, this.maxMtu);
                this.handleMtuChanged(agreed);
                return agreed;
            },
            onRead: uuid => this.handleCharacteristicRead(uuid),
            onWrite: (uuid, value) => this.handleCharacteristicWrite(uuid, value),
            onCentralDisconnected: () => this.handleCentralDisconnected(),
            onL2CAPOpen: psm => {
                if (psm !== this.getPsm()) return false;
                this.handleL2CAPConnected();
                return true;
            },
            onL2CAPData: data => this.handleL2CAPData(data)
        };
    }

    protected async startAdvertising(serviceUuid: string): Promise<void> {
        this.radio.registerPeripheral(this.endpoint);
        this.radio.advertise({ deviceId: this.deviceId, rssi: this.rssi, serviceUuids: [serviceUuid] });
    }

    protected async stopAdvertising(): Promise<void> {
        this.radio.stopAdvertising(this.deviceId);
    }

    protected sendNotification(characteristicUuid: string, value: Uint8Array): Promise<void> {
        return this.radio.notify(this.deviceId, characteristicUuid, value);
    }

    protected supportsL2CAP(): boolean {
        return this.l2capCapable;
    }

    protected async listenL2CAP(): Promise<number> {
        return this.radio.allocatePsm();
    }

    protected writeL2CAP(data: Uint8Array): Promise<void> {
        return this.radio.sendL2CAPToCentral(this.deviceId, data);
    }

    protected async disconnectCentral(): Promise<void> {
        await this.radio.disconnectCentral(this.deviceId);
        this.radio.unregisterPeripheral(this.deviceId);
    }
}
