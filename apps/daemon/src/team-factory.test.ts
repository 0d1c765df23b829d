import { AgentSchema } from '@squadron/schema';
import { describe, expect, it } from 'vitest';
import { createTeamRoster } from './team-factory.js';

describe('createTeamRoster', () => {
  it('puts the commander first and parents every sub-agent to it', () => {
    const [commander, ...subAgents] = createTeamRoster(1, 2, { now: 1000 });

    expect(commander).toMatchObject({
      name: 'Commander Atlas #1',
      role: 'commander',
      status: 'idle',
      parentId: null,
      createdAt: 1000,
    });
    expect(subAgents).toHaveLength(2);
    for (const agent of subAgents) {
      expect(agent.parentId).toBe(commander?.id);
      expect(agent.role).not.toBe('commander');
      expect(agent.status).toBe('idle');
      expect(agent.name.endsWith(' #1')).toBe(true);
    }
  });

  it('rotates commander names by team number', () => {
    expect(createTeamRoster(2, 0)[0]?.name).toBe('Commander Beacon #2');
    expect(createTeamRoster(11, 0)[0]?.name).toBe('Commander Atlas #11');
  });

  it('assigns distinct roles within the role pool', () => {
    const subAgents = createTeamRoster(1, 5).slice(1);
    expect(new Set(subAgents.map((agent) => agent.role)).size).toBe(5);
  });

  it('keeps the order of roles when the random source never swaps', () => {
    // random() close to 1 makes every Fisher-Yates swap a no-op
    const subAgents = createTeamRoster(1, 2, { random: () => 0.999 }).slice(1);
    expect(subAgents.map((agent) => agent.role)).toEqual(['developer', 'researcher']);
    expect(subAgents.map((agent) => agent.name)).toEqual(['Patch Runner #1', 'Lint Hound #1']);
  });

  it('produces agents that satisfy the schema with unique ids', () => {
    const team = createTeamRoster(3, 4);
    for (const agent of team) {
      expect(AgentSchema.safeParse(agent).success).toBe(true);
    }
    expect(new Set(team.map((agent) => agent.id)).size).toBe(team.length);
  });

  it('supports a commander without sub-agents', () => {
    expect(createTeamRoster(1, 0)).toHaveLength(1);
  });
});
