export type CommandDangerLevel = { level: 'safe' } | { level: 'dangerous'; reason: string };

interface DangerousPattern {
  pattern: RegExp;
  reason: string;
}

const DANGEROUS_PATTERNS: readonly DangerousPattern[] = [
  { pattern: /rm\s+-rf/i, reason: 'Recursive force delete (rm -rf)' },
  { pattern: /rm\s+-r\s/i, reason: 'Recursive delete (rm -r)' },
  { pattern: /rmdir/i, reason: 'Directory removal (rmdir)' },
  { pattern: /git\s+push\s+--force/i, reason: 'Force push (git push --force)' },
  { pattern: /git\s+push\s+-f/i, reason: 'Force push (git push -f)' },
  { pattern: /git\s+reset\s+--hard/i, reason: 'Hard reset (git reset --hard)' },
  { pattern: /git\s+clean\s+-f/i, reason: 'Force clean (git clean -f)' },
  { pattern: /DROP\s+TABLE/i, reason: 'SQL DROP TABLE' },
  { pattern: /DROP\s+DATABASE/i, reason: 'SQL DROP DATABASE' },
  { pattern: /TRUNCATE\s+TABLE/i, reason: 'SQL TRUNCATE TABLE' },
  { pattern: /DELETE\s+FROM\s+\w+\s*$/i, reason: 'SQL DELETE without WHERE' },
  { pattern: /sudo\s+/i, reason: 'Elevated privileges (sudo)' },
  { pattern: /chmod\s+777/i, reason: 'World-writable permissions (chmod 777)' },
  { pattern: /mkfs\./i, reason: 'Format filesystem (mkfs)' },
  { pattern: /dd\s+if=/i, reason: 'Raw disk write (dd)' },
  { pattern: />\s*\/dev\//i, reason: 'Direct device write' },
  { pattern: /:\(\)\s*\{\s*:\|:&\s*\};:/, reason: 'Fork bomb' },
  { pattern: /curl.*\|.*sh/i, reason: 'Pipe remote script to shell' },
  { pattern: /wget.*\|.*sh/i, reason: 'Pipe remote script to shell' },
];

const SHELL_TOOL_MARKERS = ['bash', 'shell', 'terminal', 'execute'];

export function isShellTool(tool: string): boolean {
  const lower = tool.toLowerCase();
  return SHELL_TOOL_MARKERS.some((marker) => lower.includes(marker));
}

/**
 * Text to classify for a tool call: the `command` argument when the tool
 * has one, otherwise the serialized input.
 */
export function commandText(input: Record<string, unknown>): string {
  const command = input.command;
  if (typeof command === 'string') return command;
  return JSON.stringify(input);
}

/**
 * Classify a tool invocation. Only shell-like tools are inspected; the first
 * matching pattern wins.
 */
export function classifyCommand(tool: string, input: string): CommandDangerLevel {
  if (!isShellTool(tool)) {
    return { level: 'safe' };
  }

  for (const { pattern, reason } of DANGEROUS_PATTERNS) {
    if (pattern.test(input)) {
      return { level: 'dangerous', reason };
    }
  }

  return { level: 'safe' };
}
