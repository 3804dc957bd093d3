import {DIFF_CONTEXT_LINES, MAX_DIFF_BYTES, MESSAGE_NO_REPO} from '../constants.js';
import {DiffLoadResult} from '../models.js';
import {synthesizeUntrackedDiff} from '../diff/untracked.js';
import {CommandResult, runCommandAsync} from '../shared/utils/commandExecutor.js';
import {logDebug, logWarn} from '../shared/utils/logger.js';

const MAX_DIFF_MB = Math.round(MAX_DIFF_BYTES / (1024 * 1024));

function describeFailure(what: string, result: CommandResult): string {
  if (result.overflow) return `Diff too large to display (over ${MAX_DIFF_MB} MB)`;
  if (result.error) return `Failed to run ${what}: ${result.error}`;
  if (/not a git repository/i.test(result.stderr)) return MESSAGE_NO_REPO;
  const detail = result.stderr.trim().split('\n')[0] || `exit code ${result.code}`;
  return `${what} failed: ${detail}`;
}

function failed(result: CommandResult): boolean {
  return result.overflow || result.error !== undefined || result.code !== 0;
}

export class GitService {
  private maxBytes: number;

  constructor(maxBytes: number = MAX_DIFF_BYTES) {
    this.maxBytes = maxBytes;
  }

  /**
   * Unstaged diff, staged diff and synthesized untracked-file diffs, joined by blank lines.
   * Any failure, including output beyond the byte ceiling, replaces the whole result.
   */
  async loadDiffText(repoRoot: string): Promise<DiffLoadResult> {
    const startedAt = performance.now();
    const diffArgs = ['git', '-C', repoRoot, 'diff', '--no-color', '--no-ext-diff', `--unified=${DIFF_CONTEXT_LINES}`];

    const unstaged = await runCommandAsync(diffArgs, {cwd: repoRoot, maxBytes: this.maxBytes});
    if (failed(unstaged)) return this.failure(describeFailure('git diff', unstaged));

    const staged = await runCommandAsync([...diffArgs, '--staged'], {cwd: repoRoot, maxBytes: this.maxBytes});
    if (failed(staged)) return this.failure(describeFailure('git diff --staged', staged));

    const untracked = await this.listUntracked(repoRoot);
    const untrackedDiff = synthesizeUntrackedDiff(repoRoot, untracked);

    const text = [unstaged.stdout, staged.stdout, untrackedDiff].filter(part => part.length > 0).join('\n');
    const bytes = Buffer.byteLength(text, 'utf8');
    if (bytes > this.maxBytes) {
      return this.failure(`Diff too large to display (over ${MAX_DIFF_MB} MB)`);
    }

    logDebug(`[Git.Diff] Loaded ${bytes} bytes (${untracked.length} untracked) in ${Math.round(performance.now() - startedAt)}ms`);
    return {ok: true, text};
  }

  async listUntracked(repoRoot: string): Promise<string[]> {
    const result = await runCommandAsync(
      ['git', '-C', repoRoot, 'ls-files', '--others', '--exclude-standard', '-z'],
      {cwd: repoRoot, maxBytes: this.maxBytes}
    );
    if (failed(result)) {
      logWarn('[Git.Untracked] Could not list untracked files', describeFailure('git ls-files', result));
      return [];
    }
    return result.stdout.split('\0').filter(Boolean);
  }

  private failure(message: string): DiffLoadResult {
    logWarn(`[Git.Diff] ${message}`);
    return {ok: false, message};
  }
}
