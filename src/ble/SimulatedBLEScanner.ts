// src/ble/SimulatedBLEScanner.ts
import { BLEScanner } from '@mdoc-proximity/core';
import { SimulatedRadio } from './SimulatedRadio';

/**
 * Scanner backed by the simulated radio
 */
export class SimulatedBLEScanner extends BLEScanner {
    private unsubscribe: (() => void) | null = null;

    constructor(private readonly radio: SimulatedRadio) {
        super();
    }

    protected async startPlatformScanning(): Promise<void> {
        this.unsubscribe = await this.radio.startScan(advertisement => {
            this.handleScanResult(advertisement.deviceId, advertisement.rssi, advertisement.serviceUuids);
        });
    }

    protected async stopPlatformScanning(): Promise<void> {
        this.unsubscribe?.();
        this.unsubscribe = null;
    }

    /**
     * Report an asynchronous platform failure, e.g. the adapter being switched off
     */
    simulateScanFailure(reason: string): void {
        this.handleScanFailure(new Error(reason));
    }
}
