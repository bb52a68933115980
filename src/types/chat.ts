/**
 * Collaborative Specification Chat Types
 *
 * Usage:
 *   import { ProjectState, ChatMessage } from '../types/chat';
 */

import type { AgentThread } from '../agents/ChatAgent';
import type { SpecAgentName } from '../prompts/spec-agents';

// ============================================================================
// PROJECT STATE
// ============================================================================

/**
 * The mutable record one chat session builds up. Artifacts hold the raw
 * agent JSON text; an empty string means "not produced yet".
 */
export interface ProjectState {
  idea: string;
  functionalSpec: string;
  testPlan: string;
  reviewFeedback: string;
  isApproved: boolean;
  devopsProjectName: string;
  devopsProjectUrl: string;
}

/**
 * Derived position in the project cycle. IMPLEMENTING only shows while an
 * implementation turn is running.
 */
export type ProjectStage =
  | 'EMPTY'
  | 'HAS_SPEC'
  | 'HAS_SPEC_AND_PLAN'
  | 'REVIEWED'
  | 'APPROVED'
  | 'DEVOPS_LINKED'
  | 'IMPLEMENTING';

// ============================================================================
// SETTINGS
// ============================================================================

export type CodeAgentName = 'claude-code' | 'codex';

export interface ChatSettings {
  orgUrl: string;
  pat: string;
  codeAgent: CodeAgentName;
}

// ============================================================================
// MESSAGES
// ============================================================================

export const SUGGESTION_ACTION_LIMIT = 5;

export type SuggestionActionName = `apply_suggestion_${number}`;

export type ChatActionName =
  | SuggestionActionName
  | 'approve_spec'
  | 'integrate_with_azure_devops'
  | 'skip_integration'
  | 'implement_project';

export interface ChatAction {
  name: ChatActionName;
  label: string;
  description?: string;
  payload: Record<string, string>;
}

export interface ChatFile {
  id: string;
  name: string;
  mimeType: string;
  content: string;
}

export type ChatFileRef = Omit<ChatFile, 'content'>;

export interface ChatMessage {
  author: string;
  content: string;
  actions?: ChatAction[];
  files?: ChatFileRef[];
}

// ============================================================================
// SESSION
// ============================================================================

export interface ChatSession {
  id: string;
  state: ProjectState;
  threads: Map<SpecAgentName, AgentThread | undefined>;
  settings: ChatSettings;
  files: Map<string, ChatFile>;
  /** Actions offered by the latest turn, by name. Others are stale. */
  pendingActions: Map<ChatActionName, ChatAction>;
  implementing: boolean;
  createdAt: Date;
}
