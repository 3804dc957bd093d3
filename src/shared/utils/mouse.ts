// Mouse input parser for SGR (1006) sequences: ESC [ < btn ; x ; y (M|m)

export type MouseWheelDirection = 'up' | 'down';

export type MouseEvent =
  | {type: 'wheel'; direction: MouseWheelDirection; x: number; y: number}
  | {type: 'click'; x: number; y: number};

/**
 * Parse SGR mouse sequences from an input chunk. Coordinates are 0-based.
 * Only left-button presses and wheel steps are reported.
 */
export function parseMouseEvents(input: string | Buffer): MouseEvent[] {
  const data = Buffer.isBuffer(input) ? input.toString('utf8') : String(input || '');
  const events: MouseEvent[] = [];

  const sgrRegex = /\x1b\[<([0-9]+);([0-9]+);([0-9]+)([mM])/g;
  let match: RegExpExecArray | null;
  while ((match = sgrRegex.exec(data)) !== null) {
    const btn = Number(match[1]);
    const x = Number(match[2]) - 1;
    const y = Number(match[3]) - 1;
    const pressed = match[4] === 'M';
    if (btn === 64) {
      events.push({type: 'wheel', direction: 'up', x, y});
    } else if (btn === 65) {
      events.push({type: 'wheel', direction: 'down', x, y});
    } else if (btn === 0 && pressed) {
      events.push({type: 'click', x, y});
    }
  }

  return events;
}

export function isMouseSequence(input: string): boolean {
  return /\[<[0-9]+;[0-9]+;[0-9]+[mM]/.test(input);
}

/** Enable SGR mouse tracking on the terminal */
export function enableMouseTracking(stream: NodeJS.WriteStream = process.stdout): void {
  // Button tracking (1000) and SGR extended mode (1006)
  stream.write('\u001b[?1000h');
  stream.write('\u001b[?1006h');
}

/** Disable SGR mouse tracking on the terminal */
export function disableMouseTracking(stream: NodeJS.WriteStream = process.stdout): void {
  stream.write('\u001b[?1006l');
  stream.write('\u001b[?1000l');
}
