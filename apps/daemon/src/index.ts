#!/usr/bin/env node

import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { print, printError } from './commands/output.js';
import { AgentTaskCoordinator, type CoordinatorEvent } from './coordinator.js';
import { toErrorMessage } from './errors.js';
import { LifecycleManager } from './lifecycle.js';
import { createChildLogger, type Logger, logger } from './logger.js';
import { createReadlinePrompter, OperatorConsole } from './operator-console.js';
import { ProcessSupervisor } from './process-supervisor.js';

interface CliArgs {
  prompt?: string;
  cwd?: string;
  teamSize?: number;
}

const USAGE = [
  'squadron - run a prompt through a commander and its team of CLI agents',
  '',
  'Usage:',
  '  squadron --prompt "Fix the failing auth tests" [options]',
  '',
  'Options:',
  '  -p, --prompt <text>      Prompt for the commander',
  '      --cwd <path>         Working directory for the agent (default: current directory)',
  '  -n, --team-size <n>      Sub-agents in the new team (default: SQUADRON_TEAM_SIZE or 2)',
  '  -h, --help               Show this help',
  '',
  'Environment:',
  '  SQUADRON_CLAUDE_PATH          Path to the claude executable (default: looked up)',
  '  SQUADRON_CLAUDE_ARGS          Extra CLI arguments, space separated',
  '  SQUADRON_STATE_DIR            Log directory (default: ~/.squadron)',
  '  SQUADRON_DISBAND_DELAY_MS     Delay before a finished team is disbanded (default: 8000)',
  '  SQUADRON_PROGRESS_TOOL_CALLS  Tool calls that count as full progress (default: 20)',
  '  SQUADRON_STALL_TIMEOUT_MS     Fail a process silent for this long (default: 0, off)',
  '  CLAUDE_PLANS_DIR              Where plan files are read from (default: ~/.claude/plans)',
  '  LOG_LEVEL                     Log level: debug, info, warn, error (default: info)',
].join('\n');

function parseCliArgs(): CliArgs {
  const { values } = parseArgs({
    options: {
      prompt: { type: 'string', short: 'p' },
      cwd: { type: 'string' },
      'team-size': { type: 'string', short: 'n' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
  });

  if (values.help) {
    print(USAGE);
    process.exit(0);
  }

  let teamSize: number | undefined;
  const rawTeamSize = values['team-size'];
  if (rawTeamSize !== undefined) {
    teamSize = Number.parseInt(rawTeamSize, 10);
    if (!/^\d+$/.test(rawTeamSize.trim()) || Number.isNaN(teamSize)) {
      printError(`--team-size must be a non-negative integer, got "${rawTeamSize}"`);
      process.exit(1);
    }
  }

  return { prompt: values.prompt, cwd: values.cwd, teamSize };
}

function logEvent(log: Logger, event: CoordinatorEvent): void {
  switch (event.type) {
    case 'agent-added':
      log.debug({ agentId: event.agent.id, name: event.agent.name }, 'Agent added');
      break;
    case 'agent-status-changed':
      log.debug(
        { agent: event.agent.name, from: event.previous, to: event.agent.status },
        'Agent status changed'
      );
      break;
    case 'task-updated':
      log.info(
        { taskId: event.task.id, status: event.task.status, progress: event.task.progress },
        'Task updated'
      );
      break;
    case 'request-raised':
      log.info({ taskId: event.request.taskId, kind: event.request.kind }, 'Operator input needed');
      break;
    case 'request-cleared':
      log.info(
        { taskId: event.request.taskId, kind: event.request.kind, reason: event.reason },
        'Request cleared'
      );
      break;
    case 'team-disbanded':
      log.info({ commanderId: event.commanderId, agents: event.agentIds.length }, 'Team disbanded');
      break;
    case 'output':
      log.debug({ taskId: event.taskId, kind: event.entry.kind }, event.entry.text);
      break;
  }
}

async function main(): Promise<void> {
  const args = parseCliArgs();
  if (!args.prompt?.trim()) {
    printError('--prompt is required. Use --help for usage.');
    process.exit(1);
  }
  const prompt = args.prompt;

  const { daemonConfig } = await import('./config.js');
  const workingDirectory = resolve(args.cwd ?? process.cwd());
  const log = createChildLogger({ component: 'cli' });
  const lifecycle = new LifecycleManager();

  const supervisor = new ProcessSupervisor({
    claudePath: daemonConfig.SQUADRON_CLAUDE_PATH,
    extraArgs: daemonConfig.SQUADRON_CLAUDE_ARGS,
    progressToolCallScale: daemonConfig.SQUADRON_PROGRESS_TOOL_CALLS,
    stallTimeoutMs: daemonConfig.SQUADRON_STALL_TIMEOUT_MS,
  });
  const coordinator = new AgentTaskCoordinator({
    supervisor,
    workingDirectory,
    teamSize: args.teamSize ?? daemonConfig.SQUADRON_TEAM_SIZE,
    disbandDelayMs: daemonConfig.SQUADRON_DISBAND_DELAY_MS,
    plansDir: daemonConfig.CLAUDE_PLANS_DIR,
  });
  const operatorConsole = new OperatorConsole({
    coordinator,
    prompter: createReadlinePrompter(lifecycle.createAbortController().signal),
  });

  lifecycle.onShutdown(async () => {
    operatorConsole.stop();
    coordinator.shutdown();
  });

  let taskId: string | null = null;
  coordinator.subscribe((event) => {
    logEvent(log, event);
    if (taskId === null) return;

    if (event.type === 'task-updated' && event.task.id === taskId) {
      if (event.task.status === 'completed' && event.task.result) {
        print(event.task.result);
      } else if (event.task.status === 'failed') {
        printError(`Task failed: ${event.task.error ?? 'unknown error'}`);
        void lifecycle.shutdown('task failed', 1);
      }
    } else if (event.type === 'team-disbanded' && event.taskIds.includes(taskId)) {
      void lifecycle.shutdown('task completed', 0);
    }
  });

  operatorConsole.start();
  log.info({ workingDirectory, teamSize: args.teamSize }, 'Submitting task');

  try {
    taskId = coordinator.submitTaskWithNewTeam(prompt).id;
  } catch (error) {
    printError(`Could not start the task: ${toErrorMessage(error)}`);
    await lifecycle.shutdown('task could not start', 1);
  }
}

main().catch((error: unknown) => {
  const errMsg = error instanceof Error ? error.message : String(error);
  const errStack = error instanceof Error ? error.stack : undefined;
  logger.error({ err: errMsg, stack: errStack }, 'Fatal error');
  process.exit(1);
});
