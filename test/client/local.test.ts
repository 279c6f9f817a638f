import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { startLocalGame } from '../../src/client/local.js';
import type { LocalGame } from '../../src/client/local.js';
import { SMALL_CATALOG } from '../fixtures/catalog.js';

describe('startLocalGame', () => {
  let now = 0;
  let game: LocalGame | undefined;

  beforeEach(() => {
    vi.useFakeTimers();
    now = 0;
  });

  afterEach(() => {
    game?.stop();
    game = undefined;
    vi.useRealTimers();
  });

  it('holds time in preparation and runs it in action', () => {
    game = startLocalGame('singleplayer', SMALL_CATALOG, { simHz: 10, now: () => now });
    expect(game.stage).toBe('preparation');
    expect(game.simulation.clock.running).toBe(false);

    now = 100;
    game.loop.frame();
    expect(game.simulation.clock.tick).toBe(0);

    game.enterStage('action');
    expect(game.stage).toBe('action');
    now = 200;
    game.loop.frame();
    expect(game.simulation.clock.tick).toBe(1);

    game.enterStage('preparation');
    now = 300;
    game.loop.frame();
    expect(game.simulation.clock.tick).toBe(1);
  });

  it('runs the explorer from the start without stages', () => {
    game = startLocalGame('explorer', SMALL_CATALOG, { simHz: 10, now: () => now });
    expect(game.stage).toBeUndefined();
    now = 100;
    game.loop.frame();
    expect(game.simulation.clock.tick).toBe(1);
    expect(() => game?.enterStage('action')).toThrow('mode explorer has no game stages');
  });

  it('stops its loop', () => {
    game = startLocalGame('singleplayer', SMALL_CATALOG, { simHz: 10, now: () => now });
    expect(game.loop.running).toBe(true);
    game.stop();
    expect(game.loop.running).toBe(false);
  });
});
