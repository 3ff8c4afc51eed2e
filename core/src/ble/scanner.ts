// core/src/ble/scanner.ts
// ================================================================================================
// BLE Scanner and Peer Selection
// ================================================================================================
//
// Runs one scan window for a service UUID and picks the peer to connect to. Subclasses
// start and stop the platform scanner and feed advertisements in through
// handleScanResult(); platform failures come in through handleScanFailure().
//
// Selection happens when the window closes: the candidate with the strongest RSSI wins,
// and on equal RSSI the one whose advertisement was seen most recently wins.

import {
    BLE_CONFIG,
    type PeerCandidate,
    type ScanEvent,
    type ScanEventCallback,
    sameUuid
} from './types';
import { MdocError, MdocErrorCode, describeError } from '../types/errors';
import { debug, debugBLE } from '../utils/debug';

export interface ScannerStatistics {
    totalScans: number;
    advertisementsReceived: number;
    advertisementsIgnored: number;
    devicesSelected: number;
    scanErrors: number;
}

export abstract class BLEScanner {
    // ===== SCAN WINDOW STATE =====
    private isScanning: boolean = false;
    private activeServiceUuid: string | null = null;
    private scanTimer?: NodeJS.Timeout;
    private endWindow?: () => void;

    // ===== CANDIDATE TRACKING =====
    private candidates: Map<string, PeerCandidate> = new Map();
    private sequence: number = 0;

    // ===== EVENT HANDLING =====
    private eventCallbacks: Set<ScanEventCallback> = new Set();

    private statistics: ScannerStatistics = {
        totalScans: 0,
        advertisementsReceived: 0,
        advertisementsIgnored: 0,
        devicesSelected: 0,
        scanErrors: 0
    };

    // ===== ABSTRACT PLATFORM METHODS =====

    /**
     * Start delivering advertisements; filtering by service is optional, the scanner
     * filters again on its side
     */
    protected abstract startPlatformScanning(serviceUuid: string): Promise<void>;

    protected abstract stopPlatformScanning(): Promise<void>;

    // ===== SCANNING =====

    /**
     * Scan for `durationMs` and return the selected peer, or null when none advertised
     * the service. Platform errors are reported as events; the window still runs out.
     */
    async scan(serviceUuid: string, durationMs: number = BLE_CONFIG.SCAN_DURATION): Promise<PeerCandidate | null> {
        if (this.isScanning) {
            throw MdocError.precondition(MdocErrorCode.INVALID_OPERATION, 'A scan is already in progress');
        }
        if (!Number.isFinite(durationMs) || durationMs < 0) {
            throw MdocError.precondition(MdocErrorCode.INVALID_INPUT, `Invalid scan duration ${durationMs}`);
        }

        this.isScanning = true;
        this.activeServiceUuid = serviceUuid;
        this.candidates.clear();
        this.sequence = 0;
        this.statistics.totalScans++;

        const window = new Promise<void>(resolve => {
            this.endWindow = resolve;
            this.scanTimer = setTimeout(resolve, durationMs);
        });

        debugBLE.scan('started', { serviceUuid, durationMs });
        this.emitEvent({ type: 'scanning-started', serviceUuid, durationMs });

        try {
            await this.startPlatformScanning(serviceUuid);
        } catch (error) {
            this.handleScanFailure(error);
        }

        await window;

        try {
            await this.stopPlatformScanning();
        } catch (error) {
            debug.warn(`Failed to stop platform scanner: ${describeError(error)}`);
        }

        const selected = this.selectCandidate();
        this.finishWindow();

        if (selected) {
            this.statistics.devicesSelected++;
            debugBLE.scan('selected', { deviceId: selected.deviceId, rssi: selected.rssi });
            this.emitEvent({ type: 'device-selected', candidate: selected });
        } else {
            debugBLE.scan('no device found', { serviceUuid });
            this.emitEvent({ type: 'no-device-found', serviceUuid });
        }
        return selected;
    }

    /**
     * Close the current window early; scan() resolves with the best candidate so far
     */
    stopScanning(): void {
        if (!this.isScanning) return;
        if (this.scanTimer) {
            clearTimeout(this.scanTimer);
            this.scanTimer = undefined;
        }
        this.endWindow?.();
    }

    /**
     * Called by subclasses for every advertisement received
     */
    protected handleScanResult(deviceId: string, rssi: number, serviceUuids: readonly string[]): void {
        const serviceUuid = this.activeServiceUuid;
        if (!this.isScanning || serviceUuid === null) {
            return;
        }

        this.statistics.advertisementsReceived++;

        if (!serviceUuids.some(uuid => sameUuid(uuid, serviceUuid))) {
            this.statistics.advertisementsIgnored++;
            return;
        }

        this.sequence++;
        if (!this.candidates.has(deviceId)) {
            debugBLE.discovery(deviceId, rssi);
        }
        this.candidates.set(deviceId, {
            deviceId,
            rssi,
            serviceUuid,
            sequence: this.sequence,
            lastSeen: Date.now()
        });
    }

    /**
     * Called by subclasses when the platform scanner fails asynchronously
     */
    protected handleScanFailure(cause: unknown): void {
        const error = cause instanceof MdocError
            ? cause
            : MdocError.platform(MdocErrorCode.SCAN_FAILED, `Scan failed: ${describeError(cause)}`, describeError(cause));

        this.statistics.scanErrors++;
        debugBLE.error('scan', error);
        this.emitEvent({ type: 'error', error });
    }

    private selectCandidate(): PeerCandidate | null {
        let best: PeerCandidate | null = null;
        for (const candidate of this.candidates.values()) {
            if (!best
                || candidate.rssi > best.rssi
                || (candidate.rssi === best.rssi && candidate.sequence > best.sequence)) {
                best = candidate;
            }
        }
        return best;
    }

    private finishWindow(): void {
        if (this.scanTimer) {
            clearTimeout(this.scanTimer);
            this.scanTimer = undefined;
        }
        this.endWindow = undefined;
        this.isScanning = false;
        this.activeServiceUuid = null;
        this.candidates.clear();
    }

    // ===== EVENTS =====

    private emitEvent(event: ScanEvent): void {
        for (const callback of this.eventCallbacks) {
            try {
                callback(event);
            } catch (error) {
                debug.error('Error in scan event callback', error);
            }
        }
    }

    onScanEvent(callback: ScanEventCallback): void {
        this.eventCallbacks.add(callback);
    }

    removeScanEventCallback(callback: ScanEventCallback): void {
        this.eventCallbacks.delete(callback);
    }

    // ===== STATUS =====

    getCandidates(): PeerCandidate[] {
        return Array.from(this.candidates.values());
    }

    getScanningStatus(): { isScanning: boolean; serviceUuid: string | null; candidates: number } {
        return {
            isScanning: this.isScanning,
            serviceUuid: this.activeServiceUuid,
            candidates: this.candidates.size
        };
    }

    getStatistics(): ScannerStatistics {
        return { ...this.statistics };
    }
}
