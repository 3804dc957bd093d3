import {useEffect, useState} from 'react';
import {useStdout} from 'ink';

export interface TerminalDimensions {
  columns: number;
  rows: number;
}

const FALLBACK: TerminalDimensions = {columns: 80, rows: 24};

function positive(value: string | number | undefined): number | null {
  const n = Number(value ?? '');
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : null;
}

/**
 * DIFF_REVIEW_TTY_COLS / DIFF_REVIEW_TTY_ROWS win over the measured size; 80x24 when neither is usable.
 */
export function resolveDimensions(
  measured: {columns?: number; rows?: number} | undefined,
  env: NodeJS.ProcessEnv = process.env
): TerminalDimensions {
  return {
    columns: positive(env.DIFF_REVIEW_TTY_COLS) ?? positive(measured?.columns) ?? FALLBACK.columns,
    rows: positive(env.DIFF_REVIEW_TTY_ROWS) ?? positive(measured?.rows) ?? FALLBACK.rows,
  };
}

export function useTerminalDimensions(): TerminalDimensions {
  const {stdout} = useStdout();
  const [dimensions, setDimensions] = useState<TerminalDimensions>(() => resolveDimensions(stdout));

  useEffect(() => {
    if (!stdout) return;
    const onResize = () => setDimensions(resolveDimensions(stdout));

    onResize();
    stdout.on('resize', onResize);
    return () => {
      stdout.off('resize', onResize);
    };
  }, [stdout]);

  return dimensions;
}
