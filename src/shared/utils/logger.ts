// In-memory log storage; the terminal belongs to Ink while the UI is up
const errorLogs: string[] = [];
const consoleLogs: string[] = [];

export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

// Format log entry with timestamp
function formatLogEntry(level: LogLevel, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  let dataStr = '';
  if (data instanceof Error) dataStr = ` ${data.message}`;
  else if (data !== undefined) dataStr = ` ${JSON.stringify(data, null, 2)}`;
  return `[${timestamp}] ${level}: ${message}${dataStr}\n`;
}

// Store log entry in memory
function storeLogEntry(isError: boolean, entry: string): void {
  if (isError) {
    errorLogs.push(entry);
  } else {
    consoleLogs.push(entry);
  }
}

function debugEnabled(): boolean {
  return process.env.DIFF_REVIEW_DEBUG === '1';
}

export function logError(message: string, error?: unknown): void {
  storeLogEntry(true, formatLogEntry('ERROR', message, error));
}

export function logWarn(message: string, data?: unknown): void {
  storeLogEntry(false, formatLogEntry('WARN', message, data));
}

export function logInfo(message: string, data?: unknown): void {
  storeLogEntry(false, formatLogEntry('INFO', message, data));
}

export function logDebug(message: string, data?: unknown): void {
  if (!debugEnabled()) return;
  storeLogEntry(false, formatLogEntry('DEBUG', message, data));
}

export function getLogs(): {errors: string[]; console: string[]} {
  return {errors: [...errorLogs], console: [...consoleLogs]};
}

export function clearLogs(): void {
  errorLogs.length = 0;
  consoleLogs.length = 0;
}

// Dump logs to stderr on exit
export function dumpLogsToConsole(): void {
  try {
    let hasContent = false;

    if (errorLogs.length > 0) {
      hasContent = true;
      console.error('\n=== ERROR LOGS ===');
      errorLogs.forEach(log => console.error(log.trim()));
    }

    if (debugEnabled() && consoleLogs.length > 0) {
      hasContent = true;
      console.error('\n=== CONSOLE LOGS ===');
      consoleLogs.forEach(log => console.error(log.trim()));
    }

    if (hasContent) {
      console.error('=== END LOGS ===\n');
    }
  } catch (error) {
    console.error('Failed to dump logs:', error);
  }
}
