import {DiffComment, SendResult} from '../models.js';
import {runCommandAsync} from '../shared/utils/commandExecutor.js';
import {logError, logInfo} from '../shared/utils/logger.js';

/**
 * `<file>:<line>: <text>` blocks separated by a blank line, with a trailing newline.
 * Sent comments are left out; no unsent comments gives an empty string.
 */
export function formatCommentsForAgent(comments: DiffComment[]): string {
  const blocks = comments
    .filter(c => !c.sent)
    .map(c => `${c.key.filePath}:${c.key.lineNumber}: ${c.text}`);
  if (blocks.length === 0) return '';
  return blocks.join('\n\n') + '\n';
}

/**
 * Hands review comments to an agent process: the command runs under `sh -c`
 * with the formatted comments on stdin.
 */
export class AgentService {
  private defaultCommand: string | null;

  constructor(defaultCommand: string | null = null) {
    this.defaultCommand = defaultCommand;
  }

  async send(payload: string, command: string | null = this.defaultCommand): Promise<SendResult> {
    if (!command) {
      return {success: false, error: 'No agent command configured'};
    }
    if (!payload) {
      return {success: false, error: 'Nothing to send'};
    }

    const result = await runCommandAsync(['sh', '-c', command], {input: payload});
    if (result.error === undefined && result.code === 0) {
      logInfo(`[Agent] Delivered ${Buffer.byteLength(payload, 'utf8')} bytes to "${command}"`);
      return {success: true};
    }

    const error = result.error ?? (result.stderr.trim() || `exit code ${result.code}`);
    logError(`[Agent] "${command}" failed`, error);
    return {success: false, error};
  }
}
