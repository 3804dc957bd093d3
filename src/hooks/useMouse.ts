import {useEffect} from 'react';
import {useStdin, useStdout} from 'ink';
import {MouseEvent, disableMouseTracking, enableMouseTracking, parseMouseEvents} from '../shared/utils/mouse.js';

export interface UseMouseOptions {
  enabled?: boolean;
  onEvent?: (ev: MouseEvent) => void;
}

/**
 * SGR mouse tracking on Ink's stdin. Tracking escapes are only written to a TTY;
 * parsing runs regardless so piped input can drive clicks.
 */
export function useMouse({enabled = true, onEvent}: UseMouseOptions = {}) {
  const {stdin} = useStdin();
  const {stdout} = useStdout();

  useEffect(() => {
    if (!enabled || !stdin) return;
    const tty = Boolean(stdout?.isTTY);
    if (tty && stdout) enableMouseTracking(stdout);

    const onData = (data: string | Buffer) => {
      const chunk = Buffer.isBuffer(data) ? data.toString('utf8') : data;
      if (!chunk.includes('\u001b[<')) return;
      for (const ev of parseMouseEvents(chunk)) onEvent?.(ev);
    };

    stdin.on('data', onData);
    return () => {
      stdin.off('data', onData);
      if (tty && stdout) disableMouseTracking(stdout);
    };
  }, [enabled, stdin, stdout, onEvent]);
}
