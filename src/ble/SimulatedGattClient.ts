// src/ble/SimulatedGattClient.ts
import {
    BLEConnectionManager,
    type ConnectionConfig,
    type DiscoveredService,
    MdocError,
    MdocErrorCode,
    type TransportListener,
    sameUuid
} from '@mdoc-proximity/core';
import { type CentralEndpoint, SimulatedRadio } from './SimulatedRadio';

export interface SimulatedClientOptions {
    centralId?: string;
    /** Whether this central can open L2CAP channels */
    l2cap?: boolean;
}

/**
 * mdoc-side GATT client on the simulated radio
 */
export class SimulatedGattClient extends BLEConnectionManager {
    private readonly radio: SimulatedRadio;
    private readonly l2capCapable: boolean;
    private peripheralId: string | null = null;
    private readonly endpoint: CentralEndpoint;

    constructor(
        radio: SimulatedRadio,
        config: Partial<ConnectionConfig> & Pick<ConnectionConfig, 'serviceUuid'>,
        options: SimulatedClientOptions = {},
        listener?: TransportListener
    ) {
        super(config, listener);
        this.radio = radio;
        this.l2capCapable = options.l2cap ?? true;
        this.endpoint = {
            centralId: options.centralId ?? 'sim-central',
            onNotification: (uuid, value) => this.handleNotification(uuid, value),
            onL2CAPData: data => this.handleL2CAPData(data),
            onLinkLost: () => this.handleLinkLost()
        };
    }

    private requirePeripheral(): string {
        if (this.peripheralId === null) {
            throw MdocError.platform(MdocErrorCode.CONNECTION_LOST, 'Not connected');
        }
        return this.peripheralId;
    }

    protected connectToDevice(deviceId: string): Promise<void> {
        this.peripheralId = deviceId;
        return this.radio.connect(deviceId, this.endpoint);
    }

    protected async discoverServices(serviceUuid: string): Promise<DiscoveredService> {
        const description = await this.radio.discover(this.requirePeripheral());
        const serviceFound = sameUuid(description.serviceUuid, serviceUuid);
        return {
            serviceFound,
            characteristics: serviceFound ? description.characteristics : []
        };
    }

    protected requestMtu(mtu: number): Promise<number> {
        return this.radio.requestMtu(this.requirePeripheral(), mtu);
    }

    protected readCharacteristic(characteristicUuid: string): Promise<Uint8Array> {
        return this.radio.read(this.requirePeripheral(), characteristicUuid);
    }

    protected enableNotifications(characteristicUuid: string): Promise<void> {
        return this.radio.subscribe(this.requirePeripheral(), characteristicUuid);
    }

    protected writeCharacteristic(characteristicUuid: string, value: Uint8Array): Promise<void> {
        return this.radio.write(this.requirePeripheral(), characteristicUuid, value);
    }

    protected supportsL2CAP(): boolean {
        return this.l2capCapable;
    }

    protected openL2CAPChannel(psm: number): Promise<void> {
        return this.radio.openL2CAP(this.requirePeripheral(), psm);
    }

    protected writeL2CAP(data: Uint8Array): Promise<void> {
        return this.radio.sendL2CAPToPeripheral(this.requirePeripheral(), data);
    }

    protected closeConnection(): Promise<void> {
        if (this.peripheralId === null) {
            return Promise.resolve();
        }
        return this.radio.disconnect(this.peripheralId);
    }
}
