/**
 * Agent wiring: one ChatAgent per role, all sharing a provider.
 */

import { AIProvider } from '../providers/AIProvider';
import { ChatAgent } from './ChatAgent';
import {
  SPEC_AGENT_NAMES,
  SpecAgentName,
  DEFINITION_AGENT_PROMPT,
  TEST_AGENT_PROMPT,
  REVIEWER_AGENT_PROMPT,
  TRIAGE_AGENT_PROMPT,
  DEVOPS_AGENT_PROMPT,
  JOB_LAUNCHER_AGENT_PROMPT,
  RESEARCH_AGENT_NAMES,
  ResearchAgentName,
  FIX_PROPOSER_PROMPT,
  ISSUE_TRACKER_PROMPT,
  INTERNET_SEARCH_PROMPT,
  REPORT_GENERATOR_PROMPT,
  RESEARCH_COORDINATOR_PROMPT,
} from '../prompts';

export { ChatAgent, AgentThread, AgentResponse, ChatAgentOptions } from './ChatAgent';

export type SpecAgents = Record<SpecAgentName, ChatAgent>;
export type ResearchAgents = Record<ResearchAgentName, ChatAgent>;

export function createSpecAgents(provider: AIProvider): SpecAgents {
  return {
    [SPEC_AGENT_NAMES.TRIAGE]: new ChatAgent(SPEC_AGENT_NAMES.TRIAGE, TRIAGE_AGENT_PROMPT, provider, { temperature: 0 }),
    [SPEC_AGENT_NAMES.DEFINITION]: new ChatAgent(SPEC_AGENT_NAMES.DEFINITION, DEFINITION_AGENT_PROMPT, provider),
    [SPEC_AGENT_NAMES.TEST]: new ChatAgent(SPEC_AGENT_NAMES.TEST, TEST_AGENT_PROMPT, provider),
    [SPEC_AGENT_NAMES.REVIEWER]: new ChatAgent(SPEC_AGENT_NAMES.REVIEWER, REVIEWER_AGENT_PROMPT, provider),
    [SPEC_AGENT_NAMES.DEVOPS]: new ChatAgent(SPEC_AGENT_NAMES.DEVOPS, DEVOPS_AGENT_PROMPT, provider),
    [SPEC_AGENT_NAMES.JOB_LAUNCHER]: new ChatAgent(SPEC_AGENT_NAMES.JOB_LAUNCHER, JOB_LAUNCHER_AGENT_PROMPT, provider),
  };
}

export function createResearchAgents(provider: AIProvider): ResearchAgents {
  return {
    [RESEARCH_AGENT_NAMES.COORDINATOR]: new ChatAgent(RESEARCH_AGENT_NAMES.COORDINATOR, RESEARCH_COORDINATOR_PROMPT, provider, {
      temperature: 0,
    }),
    [RESEARCH_AGENT_NAMES.FIX_PROPOSER]: new ChatAgent(RESEARCH_AGENT_NAMES.FIX_PROPOSER, FIX_PROPOSER_PROMPT, provider),
    [RESEARCH_AGENT_NAMES.ISSUE_TRACKER]: new ChatAgent(RESEARCH_AGENT_NAMES.ISSUE_TRACKER, ISSUE_TRACKER_PROMPT, provider),
    [RESEARCH_AGENT_NAMES.INTERNET_SEARCH]: new ChatAgent(RESEARCH_AGENT_NAMES.INTERNET_SEARCH, INTERNET_SEARCH_PROMPT, provider),
    [RESEARCH_AGENT_NAMES.REPORT_GENERATOR]: new ChatAgent(RESEARCH_AGENT_NAMES.REPORT_GENERATOR, REPORT_GENERATOR_PROMPT, provider),
  };
}
