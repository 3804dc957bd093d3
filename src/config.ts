import path from 'node:path';

export interface ReviewConfig {
  repoRoot: string;
  agentCommand: string | null;
  // null follows the terminal width
  wrapWidth: number | null;
}

function flagValue(args: string[], names: string[]): string | undefined {
  const index = args.findIndex(arg => names.includes(arg));
  if (index !== -1 && index + 1 < args.length) return args[index + 1];
  const inline = args.find(arg => names.some(name => name.startsWith('--') && arg.startsWith(`${name}=`)));
  return inline ? inline.slice(inline.indexOf('=') + 1) : undefined;
}

function parseWrapWidth(raw: string | undefined): number | null {
  if (raw === undefined || raw === '') return null;
  const value = Number(raw);
  return Number.isInteger(value) && value >= 0 ? value : null;
}

/**
 * Parse configuration once at startup.
 * Priority: CLI args > Environment variable > defaults
 */
export function parseConfig(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): ReviewConfig {
  const dir = flagValue(argv, ['--dir', '-d']) ?? env.DIFF_REVIEW_DIR;
  const agent = flagValue(argv, ['--agent', '-a']) ?? env.DIFF_REVIEW_AGENT_CMD;
  const wrap = flagValue(argv, ['--wrap', '-w']) ?? env.DIFF_REVIEW_WRAP;

  return {
    repoRoot: dir ? path.resolve(dir) : process.cwd(),
    agentCommand: agent && agent.trim() ? agent.trim() : null,
    wrapWidth: parseWrapWidth(wrap),
  };
}

export function wantsHelp(argv: string[] = process.argv.slice(2)): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

export const USAGE = `Usage: diff-review [options]

Options:
  -d, --dir <path>      Repository to review (env DIFF_REVIEW_DIR, default: cwd)
  -a, --agent <cmd>     Command that receives comments on stdin (env DIFF_REVIEW_AGENT_CMD)
  -w, --wrap <cols>     Fixed wrap width, 0 disables wrapping (env DIFF_REVIEW_WRAP)
  -h, --help            Show this help
`;
