// core/src/ble/manager.ts
// ================================================================================================
// Secure Session Manager - mdoc side
// ================================================================================================
//
// Wires one scanner, one central connection and one session engine into a presentation
// session:
//
//   scan for the reader's service -> connect -> SessionEstablishment from the reader
//   -> build the session transcript -> decrypt requests / encrypt responses
//   -> status 20 (or transport termination) -> close
//
// The manager owns the session engine and destroys it when the session ends, however it
// ends. Decryption failures answer with status 10, malformed messages with status 11;
// either way the connection is then closed.

import { BLEScanner } from './scanner';
import { BLEConnectionManager } from './connection';
import { BLE_CONFIG, type PeerCandidate, type TransportListener, TransportState } from './types';
import type { CborValue } from '../cbor/types';
import { EcKeyPair } from '../crypto/keypair';
import { SessionEncryption, parseSessionEstablishment } from '../crypto/encryption';
import { buildSessionTranscript } from '../crypto/transcript';
import { SessionRole, SessionStatus } from '../types/crypto';
import { MdocError, MdocErrorCode, type Result, err, ok } from '../types/errors';
import { debug } from '../utils/debug';

export interface SessionManagerConfig {
    serviceUuid: string;
    /** Encoded DeviceEngagement as handed to the reader */
    deviceEngagement: Uint8Array;
    /** Ephemeral device key announced in the engagement */
    eDeviceKey: EcKeyPair;
    /** Handover structure; null for QR engagement */
    handover?: CborValue;
    scanDurationMs?: number;
}

export type TerminationReason = 'status' | 'peer-disconnected' | 'transport-termination' | 'local' | 'no-reader' | 'error';

export type SessionEvent =
    | { type: 'peer-selected'; candidate: PeerCandidate }
    | { type: 'connected' }
    | { type: 'established'; sessionTranscript: Uint8Array }
    | { type: 'message'; data: Uint8Array }
    | { type: 'status'; status: number }
    | { type: 'terminated'; reason: TerminationReason }
    | { type: 'error'; error: MdocError };

export type SessionEventCallback = (event: SessionEvent) => void;

export interface SessionManagerStatistics {
    messagesSent: number;
    messagesReceived: number;
    errors: number;
}

export class BLEManager {
    private readonly scanner: BLEScanner;
    private readonly connection: BLEConnectionManager;
    private readonly config: SessionManagerConfig;
    private session: SessionEncryption;
    private sessionTranscript: Uint8Array | null = null;

    private started = false;
    private finished = false;

    private eventCallbacks: Set<SessionEventCallback> = new Set();

    private statistics: SessionManagerStatistics = {
        messagesSent: 0,
        messagesReceived: 0,
        errors: 0
    };

    constructor(scanner: BLEScanner, connection: BLEConnectionManager, config: SessionManagerConfig) {
        this.scanner = scanner;
        this.connection = connection;
        this.config = config;
        this.session = new SessionEncryption(SessionRole.MDOC, config.eDeviceKey);
        this.connection.setListener(this.createListener());
    }

    // ===== LIFECYCLE =====

    /**
     * Scan for the reader and start connecting. Resolves false when no reader was found.
     */
    async start(): Promise<boolean> {
        if (this.started) {
            throw MdocError.precondition(MdocErrorCode.INVALID_OPERATION, 'Session manager already started');
        }
        this.started = true;

        const candidate = await this.scanner.scan(
            this.config.serviceUuid,
            this.config.scanDurationMs ?? BLE_CONFIG.SCAN_DURATION
        );
        if (!candidate) {
            debug.system(`No reader advertising ${this.config.serviceUuid}`);
            this.finish('no-reader');
            return false;
        }

        this.emitEvent({ type: 'peer-selected', candidate });
        this.connection.connect(candidate.deviceId);
        return true;
    }

    /**
     * Encrypt and send one response
     */
    sendEncrypted(plaintext: Uint8Array): Result<void> {
        if (this.finished) {
            throw MdocError.precondition(MdocErrorCode.SESSION_DESTROYED, 'Session has ended');
        }
        if (!this.sessionTranscript) {
            throw MdocError.precondition(MdocErrorCode.KEYS_NOT_DERIVED, 'No SessionEstablishment received yet');
        }

        const sealed = this.session.encryptMessage(plaintext);
        if (!sealed.ok) {
            this.abort(sealed.error);
            return err(sealed.error);
        }
        this.connection.sendMessage(sealed.value);
        this.statistics.messagesSent++;
        return ok(undefined);
    }

    /**
     * End the session: status 20 by default, or 0x02 on the State characteristic
     * when `method` is 'transport'. Queued messages are delivered before the link closes.
     */
    close(method: 'status' | 'transport' = 'status'): void {
        if (this.finished) return;

        if (this.connection.getState() !== TransportState.OPEN || !this.sessionTranscript) {
            this.connection.disconnect();
            this.finish('local');
            return;
        }

        if (method === 'transport' && this.connection.getMode() === 'gatt') {
            this.connection.sendTransportSpecificTermination();
        } else {
            this.sendStatus(SessionStatus.SESSION_TERMINATION);
        }
        this.connection.sendMessage(new Uint8Array(0));
        this.finish('local');
    }

    // ===== INBOUND =====

    private createListener(): TransportListener {
        return {
            onPeerConnected: () => {
                debug.system('Reader connected');
                this.emitEvent({ type: 'connected' });
            },
            onMessageReceived: message => this.handleMessage(message),
            onPeerDisconnected: () => this.finish('peer-disconnected'),
            onTransportSpecificTermination: () => {
                this.connection.disconnect();
                this.finish('transport-termination');
            },
            onError: error => {
                this.statistics.errors++;
                this.emitEvent({ type: 'error', error });
                this.finish('error');
            }
        };
    }

    private handleMessage(message: Uint8Array): void {
        if (this.finished) return;
        this.statistics.messagesReceived++;

        if (!this.sessionTranscript) {
            const establishment = parseSessionEstablishment(message);
            if (!establishment.ok) {
                this.reject(SessionStatus.ERROR_CBOR_DECODING, establishment.error);
                return;
            }
            this.sessionTranscript = buildSessionTranscript(
                this.config.deviceEngagement,
                establishment.value.eReaderKeyBytes,
                this.config.handover ?? null
            );
            this.session.setSessionTranscript(this.sessionTranscript);
            this.emitEvent({ type: 'established', sessionTranscript: this.sessionTranscript });
        }

        const opened = this.session.decryptMessage(message);
        if (!opened.ok) {
            const status = opened.error.code === MdocErrorCode.INVALID_FORMAT
                ? SessionStatus.ERROR_CBOR_DECODING
                : SessionStatus.ERROR_SESSION_ENCRYPTION;
            this.reject(status, opened.error);
            return;
        }

        const { data, status } = opened.value;
        if (data !== undefined) {
            this.emitEvent({ type: 'message', data });
        }
        if (status !== undefined) {
            this.emitEvent({ type: 'status', status });
            if (status === SessionStatus.SESSION_TERMINATION) {
                this.connection.disconnect();
                this.finish('status');
            }
        }
    }

    /**
     * Answer a bad inbound message with a status code, then close
     */
    private reject(status: SessionStatus, error: MdocError): void {
        this.statistics.errors++;
        debug.warn(`Rejecting session message with status ${status}: ${error.message}`);
        this.emitEvent({ type: 'error', error });

        if (this.connection.getState() === TransportState.OPEN) {
            this.sendStatus(status);
            this.connection.sendMessage(new Uint8Array(0));
        } else {
            this.connection.disconnect();
        }
        this.finish('error');
    }

    private abort(error: MdocError): void {
        this.statistics.errors++;
        this.emitEvent({ type: 'error', error });
        this.connection.disconnect();
        this.finish('error');
    }

    private sendStatus(status: SessionStatus): void {
        const encoded = this.session.encryptMessage(null, status);
        if (!encoded.ok) {
            debug.error('Failed to encode session status', encoded.error);
            return;
        }
        this.connection.sendMessage(encoded.value);
        this.statistics.messagesSent++;
    }

    private finish(reason: TerminationReason): void {
        if (this.finished) return;
        this.finished = true;
        this.session.destroy();
        this.emitEvent({ type: 'terminated', reason });
    }

    // ===== EVENTS =====

    private emitEvent(event: SessionEvent): void {
        for (const callback of this.eventCallbacks) {
            try {
                callback(event);
            } catch (error) {
                debug.error('Error in session event callback', error);
            }
        }
    }

    onEvent(callback: SessionEventCallback): void {
        this.eventCallbacks.add(callback);
    }

    removeEventCallback(callback: SessionEventCallback): void {
        this.eventCallbacks.delete(callback);
    }

    // ===== STATUS =====

    getSessionTranscript(): Uint8Array | null {
        return this.sessionTranscript;
    }

    getSession(): SessionEncryption {
        return this.session;
    }

    isFinished(): boolean {
        return this.finished;
    }

    getStatistics(): SessionManagerStatistics {
        return { ...this.statistics };
    }
}
