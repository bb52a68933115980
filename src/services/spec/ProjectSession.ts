import { randomUUID } from 'crypto';
import {
  ChatAction,
  ChatActionName,
  ChatSession,
  ChatSettings,
  ProjectStage,
  ProjectState,
} from '../../types/chat';

export function createProjectState(): ProjectState {
  return {
    idea: '',
    functionalSpec: '',
    testPlan: '',
    reviewFeedback: '',
    isApproved: false,
    devopsProjectName: '',
    devopsProjectUrl: '',
  };
}

export function createChatSession(settings: Partial<ChatSettings> = {}, id: string = randomUUID()): ChatSession {
  return {
    id,
    state: createProjectState(),
    threads: new Map(),
    settings: {
      orgUrl: settings.orgUrl ?? '',
      pat: settings.pat ?? '',
      codeAgent: settings.codeAgent ?? 'claude-code',
    },
    files: new Map(),
    pendingActions: new Map(),
    implementing: false,
    createdAt: new Date(),
  };
}

/**
 * Clears the project in place for a new idea. Settings and agent threads
 * stay with the session.
 */
export function resetProject(session: ChatSession): void {
  Object.assign(session.state, createProjectState());
}

export function hasSpecAndPlan(state: ProjectState): boolean {
  return Boolean(state.functionalSpec) && Boolean(state.testPlan);
}

export function hasDevOpsSettings(settings: ChatSettings): boolean {
  return Boolean(settings.orgUrl) && Boolean(settings.pat);
}

export function projectStage(session: ChatSession): ProjectStage {
  const { state } = session;
  if (session.implementing) return 'IMPLEMENTING';
  if (state.isApproved && state.devopsProjectName) return 'DEVOPS_LINKED';
  if (state.isApproved) return 'APPROVED';
  if (hasSpecAndPlan(state) && state.reviewFeedback) return 'REVIEWED';
  if (hasSpecAndPlan(state)) return 'HAS_SPEC_AND_PLAN';
  if (state.functionalSpec) return 'HAS_SPEC';
  return 'EMPTY';
}

/**
 * Replaces the offered actions with those of the latest turn.
 */
export function offerActions(session: ChatSession, actions: ChatAction[]): void {
  session.pendingActions = new Map(actions.map((action): [ChatActionName, ChatAction] => [action.name, action]));
}

/** Session view returned by the chat API. PAT and files are left out. */
export function describeSession(session: ChatSession) {
  return {
    id: session.id,
    stage: projectStage(session),
    state: { ...session.state },
    settings: {
      orgUrl: session.settings.orgUrl,
      patConfigured: Boolean(session.settings.pat),
      codeAgent: session.settings.codeAgent,
    },
    pendingActions: [...session.pendingActions.values()],
    createdAt: session.createdAt.toISOString(),
  };
}
