/**
 * Centralized color handling using ansis with lazy initialization.
 *
 * ansis evaluates color support at module load time; deferring the
 * decision lets NO_COLOR set after import still take effect.
 */
import ansis, { Ansis } from "ansis";

let colorInstance: Ansis | null = null;

/**
 * Respects NO_COLOR, FORCE_COLOR and TERM=dumb; otherwise follows the TTY.
 */
function shouldUseColor(): boolean {
  if (process.env.NO_COLOR) {
    return false;
  }
  if (process.env.FORCE_COLOR) {
    return true;
  }
  if (process.env.TERM === "dumb") {
    return false;
  }
  return process.stdout.isTTY ?? false;
}

function getAnsis(): Ansis {
  if (colorInstance) {
    return colorInstance;
  }

  colorInstance = shouldUseColor() ? ansis : new Ansis(0);
  return colorInstance;
}

/**
 * Reset the color instance (useful for testing).
 */
export function resetColorInstance(): void {
  colorInstance = null;
}

/** Green text, or plain text when color is off. */
export function green(text: string): string {
  return getAnsis().green(text);
}
