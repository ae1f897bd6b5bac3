// ============================================
// Input State - Raw Keys to Logical Actions
// ============================================

import { KEY_BINDINGS, type InputAction, type KeyBindings } from '#shared';

/**
 * What the simulation reads from input each tick.
 */
export interface InputSource {
  isHeld(action: InputAction): boolean;
  wasJustPressed(action: InputAction): boolean;
}

const ACTIONS: readonly InputAction[] = ['forward', 'turnLeft', 'turnRight', 'fire'];

/**
 * InputState - fed raw key events by the host, queried by systems.
 *
 * "Just pressed" is a rising edge: it is set when an action goes from
 * not held to held, and cleared by endFrame() once the tick is done.
 * OS key repeat while a key is held does not re-trigger it.
 */
export class InputState implements InputSource {
  readonly keys: Set<string> = new Set();
  private justPressed = new Set<InputAction>();

  constructor(private readonly bindings: KeyBindings = KEY_BINDINGS) {}

  handleKeyDown(key: string): void {
    const normalized = key.toLowerCase();
    if (this.keys.has(normalized)) return; // key repeat

    const wasHeld = ACTIONS.filter((action) => this.isHeld(action));
    this.keys.add(normalized);

    for (const action of ACTIONS) {
      if (this.bindings[action].includes(normalized) && !wasHeld.includes(action)) {
        this.justPressed.add(action);
      }
    }
  }

  handleKeyUp(key: string): void {
    this.keys.delete(key.toLowerCase());
  }

  isHeld(action: InputAction): boolean {
    return this.bindings[action].some((key) => this.keys.has(key));
  }

  wasJustPressed(action: InputAction): boolean {
    return this.justPressed.has(action);
  }

  /**
   * Call once after every tick.
   */
  endFrame(): void {
    this.justPressed.clear();
  }

  /**
   * Release everything (focus lost, game stopped).
   */
  reset(): void {
    this.keys.clear();
    this.justPressed.clear();
  }
}
