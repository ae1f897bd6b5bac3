import { describe, it, expect, beforeEach } from 'vitest';
import { InputState } from './input';

describe('InputState', () => {
  let input: InputState;

  beforeEach(() => {
    input = new InputState();
  });

  it('maps default keys to actions', () => {
    input.handleKeyDown('w');
    input.handleKeyDown('a');
    input.handleKeyDown('d');
    input.handleKeyDown(' ');

    expect(input.isHeld('forward')).toBe(true);
    expect(input.isHeld('turnLeft')).toBe(true);
    expect(input.isHeld('turnRight')).toBe(true);
    expect(input.isHeld('fire')).toBe(true);
  });

  it('ignores case', () => {
    input.handleKeyDown('W');
    expect(input.isHeld('forward')).toBe(true);

    input.handleKeyUp('w');
    expect(input.isHeld('forward')).toBe(false);
  });

  it('reports a press until the frame ends', () => {
    input.handleKeyDown(' ');
    expect(input.wasJustPressed('fire')).toBe(true);

    input.endFrame();
    expect(input.wasJustPressed('fire')).toBe(false);
    expect(input.isHeld('fire')).toBe(true);
  });

  it('does not re-trigger on key repeat', () => {
    input.handleKeyDown(' ');
    input.endFrame();

    input.handleKeyDown(' ');

    expect(input.wasJustPressed('fire')).toBe(false);
  });

  it('triggers again after release', () => {
    input.handleKeyDown(' ');
    input.endFrame();
    input.handleKeyUp(' ');

    input.handleKeyDown(' ');

    expect(input.wasJustPressed('fire')).toBe(true);
  });

  it('keeps a press made and released within one frame', () => {
    input.handleKeyDown(' ');
    input.handleKeyUp(' ');

    expect(input.wasJustPressed('fire')).toBe(true);
    expect(input.isHeld('fire')).toBe(false);
  });

  it('treats a second key for a held action as no new press', () => {
    const custom = new InputState({ forward: ['w'], turnLeft: ['a'], turnRight: ['d'], fire: [' ', 'k'] });
    custom.handleKeyDown(' ');
    custom.endFrame();

    custom.handleKeyDown('k');

    expect(custom.wasJustPressed('fire')).toBe(false);
    expect(custom.isHeld('fire')).toBe(true);
  });

  it('ignores unbound keys', () => {
    input.handleKeyDown('x');

    expect(input.isHeld('forward')).toBe(false);
    expect(input.wasJustPressed('fire')).toBe(false);
  });

  it('releases everything on reset()', () => {
    input.handleKeyDown('w');
    input.handleKeyDown(' ');

    input.reset();

    expect(input.isHeld('forward')).toBe(false);
    expect(input.wasJustPressed('fire')).toBe(false);
    expect(input.keys.size).toBe(0);
  });
});
