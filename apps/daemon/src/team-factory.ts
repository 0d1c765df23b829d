import type { Agent, AgentRole } from '@squadron/schema';
import { nanoid } from 'nanoid';

const COMMANDER_NAMES = [
  'Commander Atlas',
  'Commander Beacon',
  'Commander Comet',
  'Commander Drift',
  'Commander Ember',
  'Commander Falcon',
  'Commander Granite',
  'Commander Harbor',
  'Commander Ion',
  'Commander Juno',
] as const;

const SUB_AGENT_NAMES = [
  'Patch Runner',
  'Lint Hound',
  'Stack Tracer',
  'Schema Scout',
  'Merge Mate',
  'Byte Smith',
  'Diff Walker',
  'Spec Keeper',
  'Cache Clerk',
  'Token Tamer',
] as const;

const SUB_AGENT_ROLES: readonly AgentRole[] = [
  'developer',
  'researcher',
  'reviewer',
  'tester',
  'designer',
];

export interface TeamRosterOptions {
  /** Uniform random source in [0, 1). Defaults to Math.random. */
  random?: () => number;
  now?: number;
}

function shuffled<T>(items: readonly T[], random: () => number): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const current = result[i];
    const swap = result[j];
    if (current === undefined || swap === undefined) continue;
    result[i] = swap;
    result[j] = current;
  }
  return result;
}

function pick<T>(items: readonly T[], index: number): T {
  const item = items[index % items.length];
  if (item === undefined) {
    throw new Error('Cannot pick from an empty list');
  }
  return item;
}

/**
 * Build a new team: the commander first, then `subAgentCount` sub-agents.
 * The commander name rotates with `teamNumber`; sub-agent roles and names
 * are shuffled per team.
 */
export function createTeamRoster(
  teamNumber: number,
  subAgentCount: number,
  options: TeamRosterOptions = {}
): Agent[] {
  const random = options.random ?? Math.random;
  const createdAt = options.now ?? Date.now();

  const commander: Agent = {
    id: nanoid(),
    name: `${pick(COMMANDER_NAMES, teamNumber - 1)} #${teamNumber}`,
    role: 'commander',
    status: 'idle',
    parentId: null,
    createdAt,
  };

  const roles = shuffled(SUB_AGENT_ROLES, random);
  const names = shuffled(SUB_AGENT_NAMES, random);
  const subAgents = Array.from(
    { length: subAgentCount },
    (_, i): Agent => ({
      id: nanoid(),
      name: `${pick(names, i)} #${teamNumber}`,
      role: pick(roles, i),
      status: 'idle',
      parentId: commander.id,
      createdAt,
    })
  );

  return [commander, ...subAgents];
}
