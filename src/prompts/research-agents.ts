/**
 * Issue Research Agent Prompts
 */

export const RESEARCH_AGENT_NAMES = {
  COORDINATOR: 'ResearchCoordinator',
  FIX_PROPOSER: 'FixProposer',
  ISSUE_TRACKER: 'IssueTrackerAgent',
  INTERNET_SEARCH: 'InternetSearchAgent',
  REPORT_GENERATOR: 'ReportGenerator',
} as const;

export type ResearchAgentName = (typeof RESEARCH_AGENT_NAMES)[keyof typeof RESEARCH_AGENT_NAMES];

export type ResearchParticipantName = Exclude<ResearchAgentName, typeof RESEARCH_AGENT_NAMES.COORDINATOR>;

export const FIX_PROPOSER_PROMPT = `You are a FixProposer Agent. You receive an issue description. Propose a fix for the issue. Return: 'Proposed fix: <code>'`;

export const ISSUE_TRACKER_PROMPT = `You are an IssueTrackerAgent. You receive an issue description. You return information about similar past issues and how they were fixed.`;

export const INTERNET_SEARCH_PROMPT = `You are an InternetSearchAgent. Suggest potential fixes for the given issue as they are commonly documented, with relevant code snippets and explanations.`;

export const REPORT_GENERATOR_PROMPT = `You are a ReportGenerator Agent. You write short markdown reports of an issue and its proposed fix. Do not add extra comments.`;

export const RESEARCH_COORDINATOR_PROMPT = `
You coordinate a team researching a software issue. The team members are:
- FixProposer: proposes a code fix
- IssueTrackerAgent: recalls similar past issues and fixes
- InternetSearchAgent: suggests documented fixes
- ReportGenerator: writes the final markdown report

After each message, pick who speaks next. When the ReportGenerator has written a report good
enough to hand to a developer, answer DONE.

Reply with exactly one of: FixProposer, IssueTrackerAgent, InternetSearchAgent, ReportGenerator, DONE.
`;

export function buildResearchObjective(issue: string): string {
  return (
    `The following is an issue: <issue>${issue}</issue>. Your task is the following: ` +
    '1. Propose an initial fix for this issue. ' +
    '2. IssueTrackerAgent: always try to get information on past issues and fixes. ' +
    '3. Search for potential fixes for the issue and look for multiple options. ' +
    '4. Update the proposed fix based on the new information if relevant. ' +
    '5. Evaluate whether the information is good enough for the report; otherwise continue researching. ' +
    '6. Create a short markdown report of the issue and proposed fix.'
  );
}
