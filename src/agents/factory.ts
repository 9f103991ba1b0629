import { PLAYERS, type Agent } from '../kernel/types.js';
import { RandomAgent } from './random-agent.js';
import { passWhenOpponentPasses, resignLargeMargin, TerminationAgent } from './termination.js';

export const AGENT_TYPES = ['random', 'random-pass', 'random-resign'] as const;

export type AgentType = (typeof AGENT_TYPES)[number];

export const createAgent = (type: AgentType): Agent => {
  switch (type) {
    case 'random':
      return new RandomAgent();
    case 'random-pass':
      return new TerminationAgent(new RandomAgent(), passWhenOpponentPasses);
    case 'random-resign':
      return new TerminationAgent(new RandomAgent(), resignLargeMargin());
  }
};

const isAgentType = (value: string): value is AgentType => AGENT_TYPES.some((type) => type === value);

/** Comma-separated agent types, black first: `"random,random-pass"`. */
export const parseAgentSpec = (spec: string): readonly Agent[] => {
  const types = spec
    .split(',')
    .map((part) => part.trim().toLowerCase())
    .filter((part) => part.length > 0);

  if (types.length !== PLAYERS.length) {
    throw new Error(`Agent spec has ${types.length} agents but a game needs ${PLAYERS.length} players`);
  }

  return types.map((type) => {
    if (!isAgentType(type)) {
      throw new Error(`Unknown agent type: ${type}. Allowed: ${AGENT_TYPES.join(', ')}`);
    }
    return createAgent(type);
  });
};
