import {render} from 'ink';
import React from 'react';
import App from './App.js';
import {ReviewConfig} from './config.js';
import {DiffReviewEngine} from './engine/DiffReviewEngine.js';
import {runCommandQuickAsync} from './shared/utils/commandExecutor.js';
import {logDebug, logError, logWarn} from './shared/utils/logger.js';

/**
 * Top of the work tree containing dir, or dir itself when git cannot tell.
 */
export async function resolveRepoRoot(dir: string): Promise<string> {
  const result = await runCommandQuickAsync(['git', '-C', dir, 'rev-parse', '--show-toplevel']);
  const top = result.stdout.trim();
  if (result.code === 0 && top) return top;
  logWarn(`[Bootstrap] Not inside a git work tree: ${dir}`, result.error ?? result.stderr.trim());
  return dir;
}

export async function run(config: ReviewConfig): Promise<void> {
  const repoRoot = await resolveRepoRoot(config.repoRoot);
  logDebug(`[Bootstrap] Reviewing ${repoRoot}`);
  const engine = new DiffReviewEngine({
    repoRoot,
    agentCommand: config.agentCommand,
    wrapWidth: config.wrapWidth ?? undefined
  });

  const {waitUntilExit} = render(<App engine={engine} fixedWrapWidth={config.wrapWidth} />);

  engine.load().catch(error => logError('[Bootstrap] Initial diff load failed', error));

  // Comments are saved on every edit; this covers signals that bypass the quit key
  let saved = false;
  const save = () => {
    if (saved) return;
    saved = true;
    engine.hide();
  };
  process.on('SIGINT', () => { save(); process.exit(0); });
  process.on('SIGTERM', () => { save(); process.exit(0); });
  process.on('exit', save);

  await waitUntilExit();
}
