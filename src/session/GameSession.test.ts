import { describe, expect, it } from 'vitest';
import { createSeededRandom } from '../rng.ts';
import { RecordingTelemetrySink } from '../telemetry/TelemetrySink.ts';
import { WAIT_MESSAGE } from '../turn/TurnResolver.ts';
import { WELCOME_MESSAGE } from '../world/LevelGenerator.ts';
import { GameSession } from './GameSession.ts';

function createSession(sink = new RecordingTelemetrySink()) {
  return {
    sink,
    session: new GameSession({
      config: { monsterCount: 0, itemCount: 0 },
      random: createSeededRandom(33),
      telemetry: sink
    })
  };
}

describe('GameSession', () => {
  it('starts a game immediately', () => {
    const { session, sink } = createSession();

    expect(session.snapshot().messages).toEqual([WELCOME_MESSAGE]);
    expect(sink.events()).toEqual(['new_level', 'game_start']);
  });

  it('returns the unchanged snapshot for unknown commands', () => {
    const { session, sink } = createSession();
    sink.clear();
    const before = session.snapshot();

    expect(session.handleCommand('dance')).toEqual(before);
    expect(session.handleCommand(null)).toEqual(before);
    expect(sink.messages).toEqual([]);
  });

  it('applies known commands', () => {
    const { session } = createSession();

    const view = session.handleCommand('wait');

    expect(view.messages).toEqual([WELCOME_MESSAGE, WAIT_MESSAGE]);
    expect(session.state.monsterTurnCounter).toBe(1);
  });

  it('replaces the game on restart', () => {
    const { session, sink } = createSession();
    const first = session.state;
    session.handleCommand('wait');
    sink.clear();

    const view = session.handleCommand('restart');

    expect(session.state).not.toBe(first);
    expect(view.messages).toEqual([WELCOME_MESSAGE]);
    expect(sink.events()).toEqual(['new_level', 'game_start']);
  });

  it('starts over on any command once the player is dead', () => {
    const { session } = createSession();
    const dead = session.state;
    dead.player.hp = 0;

    const view = session.handleCommand('left');

    expect(session.state).not.toBe(dead);
    expect(view.gameOver).toBe(false);
    expect(view.player.hp).toBe(10);
    expect(view.level).toBe(1);
  });

  it('closes the shared sink', () => {
    const { session, sink } = createSession();

    session.close();

    expect(sink.isClosed()).toBe(true);
  });
});
