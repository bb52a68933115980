/**
 * IssueResearchRunner
 *
 * A coordinated group chat over one issue. The coordinator picks who speaks
 * next from the transcript; the run ends when it answers DONE or the
 * transcript reaches the message limit. The report is the closing message;
 * the ReportGenerator is asked once more when someone else spoke last.
 */

import { ResearchAgents } from '../../agents';
import {
  RESEARCH_AGENT_NAMES,
  ResearchParticipantName,
  buildResearchObjective,
} from '../../prompts/research-agents';
import { containsLabel } from '../spec/TriageRouter';
import { Logger } from '../../utils/logger';

export interface TranscriptEntry {
  speaker: string;
  content: string;
}

export interface ResearchResult {
  report: string;
  transcript: TranscriptEntry[];
}

const TASK_SPEAKER = 'user';

/** Speaking order used when the coordinator's answer names nobody. */
export const PARTICIPANT_ORDER: readonly ResearchParticipantName[] = [
  RESEARCH_AGENT_NAMES.FIX_PROPOSER,
  RESEARCH_AGENT_NAMES.ISSUE_TRACKER,
  RESEARCH_AGENT_NAMES.INTERNET_SEARCH,
  RESEARCH_AGENT_NAMES.REPORT_GENERATOR,
];

export type CoordinatorChoice = { done: true } | { done: false; speaker: ResearchParticipantName | undefined };

export function parseCoordinatorChoice(raw: string): CoordinatorChoice {
  if (containsLabel(raw.toUpperCase(), 'DONE')) {
    return { done: true };
  }
  const lowered = raw.toLowerCase();
  return { done: false, speaker: PARTICIPANT_ORDER.find((name) => lowered.includes(name.toLowerCase())) };
}

function formatTranscript(transcript: readonly TranscriptEntry[]): string {
  return transcript.map((entry) => `[${entry.speaker}]\n${entry.content}`).join('\n\n');
}

export class IssueResearchRunner {
  constructor(
    private readonly agents: ResearchAgents,
    private readonly maxMessages: number = 20
  ) {}

  async run(issue: string): Promise<ResearchResult> {
    const transcript: TranscriptEntry[] = [{ speaker: TASK_SPEAKER, content: buildResearchObjective(issue) }];
    let fallbackIndex = 0;

    while (transcript.length < this.maxMessages) {
      const choice = await this.nextSpeaker(transcript);
      if (choice.done) {
        Logger.info('Research coordinator finished', { messages: transcript.length });
        break;
      }

      const speaker = choice.speaker ?? PARTICIPANT_ORDER[fallbackIndex++ % PARTICIPANT_ORDER.length];
      const content = await this.speak(speaker, transcript);
      transcript.push({ speaker, content });
    }

    let report = this.finalReport(transcript);
    if (report === undefined) {
      report = await this.speak(RESEARCH_AGENT_NAMES.REPORT_GENERATOR, transcript);
      transcript.push({ speaker: RESEARCH_AGENT_NAMES.REPORT_GENERATOR, content: report });
    }

    Logger.info('Issue research completed', { messages: transcript.length, reportLength: report.length });
    return { report, transcript };
  }

  private async nextSpeaker(transcript: readonly TranscriptEntry[]): Promise<CoordinatorChoice> {
    const response = await this.agents[RESEARCH_AGENT_NAMES.COORDINATOR].send(
      `Conversation so far:\n\n${formatTranscript(transcript)}\n\nWho should speak next?`
    );
    return parseCoordinatorChoice(response.content);
  }

  private async speak(speaker: ResearchParticipantName, transcript: readonly TranscriptEntry[]): Promise<string> {
    const response = await this.agents[speaker].send(
      `${formatTranscript(transcript)}\n\nContinue the research as ${speaker}.`
    );
    Logger.agent(speaker, 'Research contribution', { length: response.content.length });
    return response.content;
  }

  /** The closing message, when the ReportGenerator wrote it. */
  private finalReport(transcript: readonly TranscriptEntry[]): string | undefined {
    const last = transcript[transcript.length - 1];
    return last.speaker === RESEARCH_AGENT_NAMES.REPORT_GENERATOR ? last.content : undefined;
  }
}
