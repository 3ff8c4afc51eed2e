import { describe, it, expect } from 'vitest';
import { GattServerTransport, ServerState } from '../src/ble/server';
import type { ServerConfig } from '../src/ble/server';
import { BLE_CONFIG } from '../src/ble/types';
import type { TransportListener } from '../src/ble/types';
import { ErrorKind, MdocError, MdocErrorCode } from '../src/types/errors';
import { bytesToHex, hexToBytes, utf8ToBytes } from '../src/utils/bytes';

const SERVICE_UUID = '0000feed-0000-1000-8000-00805f9b34fb';
const { STATE, CLIENT2SERVER, SERVER2CLIENT, IDENT, L2CAP_PSM } = BLE_CONFIG.CHARACTERISTICS;

class FakeServer extends GattServerTransport {
  calls: string[] = [];
  sent: string[] = [];
  l2cap = false;
  advertisingFailure: Error | null = null;
  notificationFailure: Error | null = null;

  constructor(config: Partial<ServerConfig> = {}, listener?: TransportListener) {
    super({ serviceUuid: SERVICE_UUID, lingerDelayMs: 5, ...config }, listener);
  }

  protected startAdvertising(serviceUuid: string): Promise<void> {
    this.calls.push(`advertise:${serviceUuid}`);
    return this.advertisingFailure ? Promise.reject(this.advertisingFailure) : Promise.resolve();
  }

  protected stopAdvertising(): Promise<void> {
    this.calls.push('stopAdvertising');
    return Promise.resolve();
  }

  protected sendNotification(characteristicUuid: string, value: Uint8Array): Promise<void> {
    this.sent.push(`${characteristicUuid}:${bytesToHex(value)}`);
    return this.notificationFailure ? Promise.reject(this.notificationFailure) : Promise.resolve();
  }

  protected supportsL2CAP(): boolean {
    return this.l2cap;
  }

  protected listenL2CAP(): Promise<number> {
    this.calls.push('listen');
    return Promise.resolve(0x0081);
  }

  protected writeL2CAP(data: Uint8Array): Promise<void> {
    this.sent.push(`socket:${bytesToHex(data)}`);
    return Promise.resolve();
  }

  protected disconnectCentral(): Promise<void> {
    this.calls.push('disconnectCentral');
    return Promise.resolve();
  }

  connectCentral(deviceId = 'mdoc-1'): void {
    this.handleCentralConnected(deviceId);
  }

  mtu(mtu: number): void {
    this.handleMtuChanged(mtu);
  }

  read(uuid: string): Uint8Array | null {
    return this.handleCharacteristicRead(uuid);
  }

  hosted(): string[] {
    return this.hostedCharacteristics();
  }

  write(uuid: string, value: Uint8Array): void {
    this.handleCharacteristicWrite(uuid, value);
  }

  channelOpened(): void {
    this.handleL2CAPConnected();
  }

  socketData(data: Uint8Array): void {
    this.handleL2CAPData(data);
  }

  centralGone(): void {
    this.handleCentralDisconnected();
  }
}

interface Recorded {
  listener: TransportListener;
  events: string[];
  messages: string[];
  errors: MdocError[];
}

function recorder(): Recorded {
  const recorded: Recorded = {
    events: [],
    messages: [],
    errors: [],
    listener: {
      onPeerConnected: () => recorded.events.push('connected'),
      onMessageReceived: message => {
        recorded.events.push('message');
        recorded.messages.push(new TextDecoder().decode(message));
      },
      onPeerDisconnected: () => recorded.events.push('disconnected'),
      onTransportSpecificTermination: () => recorded.events.push('termination'),
      onError: error => {
        recorded.events.push('error');
        recorded.errors.push(error);
      },
    },
  };
  return recorded;
}

function settle(ms = 0): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

async function openServer(recorded: Recorded, config: Partial<ServerConfig> = {}): Promise<FakeServer> {
  const server = new FakeServer(config, recorded.listener);
  await server.start();
  server.connectCentral();
  server.write(STATE, hexToBytes('01'));
  return server;
}

// ─── Lifecycle ───────────────────────────────────────────────────────────────

describe('GattServerTransport lifecycle', () => {
  it('advertises, accepts a central and opens on the start signal', async () => {
    const recorded = recorder();
    const server = new FakeServer({}, recorded.listener);
    const states: ServerState[] = [];
    server.onStateChange(state => states.push(state));

    await server.start();
    expect(server.calls).toEqual([`advertise:${SERVICE_UUID}`]);

    server.connectCentral('mdoc-1');
    expect(server.getCentralId()).toBe('mdoc-1');

    server.write(STATE, hexToBytes('01'));
    expect(states).toEqual([ServerState.ADVERTISING, ServerState.CONNECTED, ServerState.OPEN]);
    expect(server.getMode()).toBe('gatt');
    expect(recorded.events).toEqual(['connected']);
  });

  it('refuses to start twice', async () => {
    const server = new FakeServer();
    await server.start();
    await expect(server.start()).rejects.toMatchObject({ kind: ErrorKind.PRECONDITION });
  });

  it('wraps advertising failures', async () => {
    const server = new FakeServer();
    server.advertisingFailure = new Error('no adapter');
    await expect(server.start()).rejects.toMatchObject({
      kind: ErrorKind.PLATFORM,
      code: MdocErrorCode.ADVERTISING_FAILED,
      message: 'Failed to start GATT server: no adapter',
    });
    expect(server.getState()).toBe(ServerState.IDLE);
  });

  it('ignores a second central', async () => {
    const server = await openServer(recorder());
    server.connectCentral('mdoc-2');
    expect(server.getCentralId()).toBe('mdoc-1');
  });

  it('makes no callbacks after stop()', async () => {
    const recorded = recorder();
    const server = await openServer(recorded);
    server.stop();
    server.write(CLIENT2SERVER, hexToBytes('0068'));
    server.centralGone();
    await settle();

    expect(server.getState()).toBe(ServerState.CLOSED);
    expect(recorded.events).toEqual(['connected']);
    expect(server.calls.slice(-2)).toEqual(['stopAdvertising', 'disconnectCentral']);
  });
});

// ─── Characteristics ─────────────────────────────────────────────────────────

describe('GattServerTransport characteristics', () => {
  it('serves Ident only when configured', () => {
    const ident = hexToBytes('00112233445566778899aabbccddeeff');
    const withIdent = new FakeServer({ ident });
    expect(withIdent.read(IDENT.toUpperCase())).toEqual(ident);
    expect(withIdent.hosted()).toEqual([STATE, CLIENT2SERVER, SERVER2CLIENT, IDENT]);

    const without = new FakeServer();
    expect(without.read(IDENT)).toBeNull();
    expect(without.hosted()).toEqual([STATE, CLIENT2SERVER, SERVER2CLIENT]);
  });

  it('serves the PSM as two big-endian bytes once listening', async () => {
    const server = new FakeServer({ useL2CAP: true });
    server.l2cap = true;
    expect(server.read(L2CAP_PSM)).toBeNull();

    await server.start();
    expect(server.calls).toEqual(['listen', `advertise:${SERVICE_UUID}`]);
    expect(server.getPsm()).toBe(0x81);
    expect(bytesToHex(server.read(L2CAP_PSM) ?? new Uint8Array(0))).toBe('0081');
    expect(server.hosted()).toContain(L2CAP_PSM);
  });

  it('does not listen when the platform has no L2CAP', async () => {
    const server = new FakeServer({ useL2CAP: true });
    await server.start();
    expect(server.calls).toEqual([`advertise:${SERVICE_UUID}`]);
    expect(server.getPsm()).toBeNull();
  });
});

// ─── Characteristic path ─────────────────────────────────────────────────────

describe('GattServerTransport characteristic exchange', () => {
  it('reassembles Client2Server chunks', async () => {
    const recorded = recorder();
    const server = await openServer(recorded);
    server.write(CLIENT2SERVER, hexToBytes('016869'));
    server.write(CLIENT2SERVER.toUpperCase(), hexToBytes('0021'));
    expect(recorded.messages).toEqual(['hi!']);
  });

  it('chunks outbound messages to the negotiated attribute size', async () => {
    const server = await openServer(recorder());
    server.mtu(23);
    expect(server.getAttributeSize()).toBe(20);

    server.sendMessage(utf8ToBytes('abcdefghijklmnopqrstuvwxyz'));
    expect(server.sent).toEqual([`${SERVER2CLIENT}:016162636465666768696a6b6c6d6e6f70717273`]);

    await settle();
    expect(server.sent).toEqual([
      `${SERVER2CLIENT}:016162636465666768696a6b6c6d6e6f70717273`,
      `${SERVER2CLIENT}:007475767778797a`,
    ]);
  });

  it('notifies 0x02 on State for termination', async () => {
    const server = await openServer(recorder());
    server.sendTransportSpecificTermination();
    expect(server.sent).toEqual([`${STATE}:02`]);
  });

  it('reports termination written by the mdoc', async () => {
    const recorded = recorder();
    const server = await openServer(recorded);
    server.write(STATE, hexToBytes('02'));
    expect(recorded.events).toEqual(['connected', 'termination']);
    expect(server.getState()).toBe(ServerState.OPEN);
  });

  it('closes on an invalid State value', async () => {
    const recorded = recorder();
    const server = await openServer(recorded);
    server.write(STATE, hexToBytes('03'));

    expect(server.getState()).toBe(ServerState.CLOSED);
    expect(recorded.errors[0].code).toBe(MdocErrorCode.INVALID_STATE_VALUE);
    expect(recorded.errors[0].message).toBe('Unexpected State characteristic value 03');
  });

  it('closes on a Client2Server write before the start signal', async () => {
    const recorded = recorder();
    const server = new FakeServer({}, recorded.listener);
    await server.start();
    server.connectCentral();
    server.write(CLIENT2SERVER, hexToBytes('0068'));
    await settle();

    expect(recorded.errors[0].code).toBe(MdocErrorCode.UNEXPECTED_EVENT);
    expect(recorded.errors[0].message).toBe('Client2Server write in state CONNECTED');
    expect(server.calls.slice(-2)).toEqual(['stopAdvertising', 'disconnectCentral']);
  });

  it('treats the mdoc sentinel as disconnection', async () => {
    const recorded = recorder();
    const server = await openServer(recorded);
    server.write(CLIENT2SERVER, hexToBytes('00'));
    expect(recorded.events).toEqual(['connected', 'disconnected']);
    expect(server.getState()).toBe(ServerState.CLOSED);
  });

  it('sends the sentinel, lingers, then closes quietly', async () => {
    const recorded = recorder();
    const server = await openServer(recorded);
    server.sendMessage(utf8ToBytes('bye'));
    server.sendMessage(new Uint8Array(0));
    expect(() => server.sendMessage(utf8ToBytes('late'))).toThrow(MdocError);

    await settle();
    expect(server.sent).toEqual([`${SERVER2CLIENT}:00627965`, `${SERVER2CLIENT}:00`]);
    expect(server.getState()).toBe(ServerState.CLOSING);

    await settle(20);
    expect(server.getState()).toBe(ServerState.CLOSED);
    expect(recorded.events).toEqual(['connected']);
    expect(server.calls.slice(-1)).toEqual(['disconnectCentral']);
  });

  it('reports a notification failure', async () => {
    const recorded = recorder();
    const server = await openServer(recorded);
    server.notificationFailure = new Error('not subscribed');
    server.sendMessage(utf8ToBytes('x'));
    await settle();

    expect(recorded.errors[0].code).toBe(MdocErrorCode.WRITE_FAILED);
    expect(recorded.errors[0].message).toBe('Notification failed: not subscribed');
  });

  it('reports the central leaving', async () => {
    const recorded = recorder();
    const server = await openServer(recorded);
    server.centralGone();
    expect(recorded.events).toEqual(['connected', 'disconnected']);
  });

  it('reports the central leaving before the start signal as an error', async () => {
    const recorded = recorder();
    const server = new FakeServer({}, recorded.listener);
    await server.start();
    server.connectCentral();
    server.centralGone();
    expect(recorded.errors[0].code).toBe(MdocErrorCode.CONNECTION_LOST);
  });
});

// ─── L2CAP path ──────────────────────────────────────────────────────────────

describe('GattServerTransport L2CAP exchange', () => {
  async function openChannel(recorded: Recorded): Promise<FakeServer> {
    const server = new FakeServer({ useL2CAP: true }, recorded.listener);
    server.l2cap = true;
    await server.start();
    server.connectCentral();
    server.channelOpened();
    return server;
  }

  it('opens on the channel and exchanges framed messages', async () => {
    const recorded = recorder();
    const server = await openChannel(recorded);
    expect(server.getMode()).toBe('l2cap');
    expect(recorded.events).toEqual(['connected']);

    server.socketData(hexToBytes('000000'));
    server.socketData(hexToBytes('026869'));
    expect(recorded.messages).toEqual(['hi']);

    server.sendMessage(utf8ToBytes('abc'));
    expect(server.sent).toEqual(['socket:00000003616263']);
  });

  it('treats a zero-length frame as disconnection', async () => {
    const recorded = recorder();
    const server = await openChannel(recorded);
    server.socketData(hexToBytes('00000000'));
    expect(recorded.events).toEqual(['connected', 'disconnected']);
  });

  it('closes after the linger delay on an empty message', async () => {
    const recorded = recorder();
    const server = await openChannel(recorded);
    server.sendMessage(new Uint8Array(0));
    expect(server.getState()).toBe(ServerState.CLOSING);
    expect(server.sent).toEqual([]);

    await settle(20);
    expect(server.getState()).toBe(ServerState.CLOSED);
  });

  it('has no transport-specific termination', async () => {
    const server = await openChannel(recorder());
    expect(() => server.sendTransportSpecificTermination()).toThrow(/not supported over L2CAP/);
  });
});
