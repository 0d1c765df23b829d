import { describe, expect, it } from 'vitest';
import { AgentSchema, isActiveStatus, isCommander } from './agent.js';

describe('isCommander', () => {
  it('is true only for agents without a parent', () => {
    expect(isCommander({ parentId: null })).toBe(true);
    expect(isCommander({ parentId: 'lead-1' })).toBe(false);
  });
});

describe('isActiveStatus', () => {
  it('counts working and thinking as active', () => {
    expect(isActiveStatus('working')).toBe(true);
    expect(isActiveStatus('thinking')).toBe(true);
    expect(isActiveStatus('waitingForAnswer')).toBe(false);
    expect(isActiveStatus('idle')).toBe(false);
  });
});

describe('AgentSchema', () => {
  it('rejects an empty name', () => {
    const result = AgentSchema.safeParse({
      id: 'a1',
      name: '',
      role: 'developer',
      status: 'idle',
      parentId: 'lead-1',
      createdAt: 0,
    });
    expect(result.success).toBe(false);
  });
});
