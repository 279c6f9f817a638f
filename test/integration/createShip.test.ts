import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { startServer } from '../../src/app.js';
import type { StartedServer } from '../../src/app.js';
import type { CreateShipMessage, PeriodicUpdateMessage, ToClientMessage } from '../../src/types/messages.js';
import { SMALL_CATALOG } from '../fixtures/catalog.js';
import { connectTestClient, isType } from './helpers.js';

const NO_CERT = '/nonexistent/orbit-relay-test.pem';

const createShip: CreateShipMessage = {
  type: 'createShip',
  payload: {
    id: 'scout',
    acceleration: { x: 0, y: 0, z: 0 },
    position: { x: 1.2e8, y: 0, z: 0 },
    velocity: { x: 0, y: 2e6, z: 0 },
  },
};

function hasShip(id: string) {
  return (m: ToClientMessage): m is PeriodicUpdateMessage =>
    m.type === 'periodicUpdate' && m.payload.ships.some((s) => s.id === id);
}

describe('ship replication', () => {
  let server: StartedServer;

  beforeEach(async () => {
    server = await startServer(0, {
      host: '127.0.0.1',
      catalog: SMALL_CATALOG,
      running: false,
      simHz: 100,
      broadcastHz: 50,
      tlsCertPath: NO_CERT,
      tlsKeyPath: NO_CERT,
    });
  });

  afterEach(async () => {
    await server.stop();
  });

  it('creates a ship while paused and broadcasts it', async () => {
    const client = await connectTestClient(server.port);
    client.socket.send(JSON.stringify(createShip));
    const update = await client.waitForMessage(hasShip('scout'));
    expect(update.payload.tick).toBe(0);
    expect(update.payload.ships).toEqual([
      { id: 'scout', position: createShip.payload.position, velocity: createShip.payload.velocity },
    ]);
    expect(server.simulation.ships.get('scout')?.influence.mainInfluencer).toBe('sol');
    await client.close();
  });

  it('shows the ship to every client', async () => {
    const a = await connectTestClient(server.port);
    const b = await connectTestClient(server.port);
    a.socket.send(JSON.stringify(createShip));
    await b.waitForMessage(hasShip('scout'));
    await Promise.all([a.close(), b.close()]);
  });

  it('ignores a duplicate creation', async () => {
    const client = await connectTestClient(server.port);
    client.socket.send(JSON.stringify(createShip));
    await client.waitForMessage(hasShip('scout'));
    const moved = { ...createShip, payload: { ...createShip.payload, position: { x: 5e7, y: 0, z: 0 } } };
    const sentAt = client.received.length;
    client.socket.send(JSON.stringify(moved));
    // two broadcasts later the frame has been drained
    await client.waitForMessage(
      (m): m is PeriodicUpdateMessage => m.type === 'periodicUpdate' && client.received.indexOf(m) > sentAt,
    );
    expect(server.simulation.ships.size).toBe(1);
    expect(server.simulation.ships.get('scout')?.position).toEqual(createShip.payload.position);
    await client.close();
  });

  it('broadcasts time toggles and body changes', async () => {
    const client = await connectTestClient(server.port);
    await client.waitForMessage(isType('initialData'));
    expect(server.toggleTime()).toBe(true);
    const toggle = await client.waitForMessage(isType('toggleTime'));
    expect(toggle.payload).toBe(true);

    server.setBodiesConfig({ kind: 'smallestBodyType', bodyType: 'moon' });
    const bodies = await client.waitForMessage(isType('bodiesConfig'));
    expect(bodies.payload).toEqual({ kind: 'smallestBodyType', bodyType: 'moon' });
    expect(server.simulation.system.size).toBe(4);
    await client.close();
  });

  it('advances the broadcast tick once time runs', async () => {
    const client = await connectTestClient(server.port);
    server.toggleTime();
    const update = await client.waitForMessage(
      (m): m is PeriodicUpdateMessage => m.type === 'periodicUpdate' && m.payload.tick > 0,
    );
    expect(update.payload.tick).toBeGreaterThan(0);
    await client.close();
  });
});
