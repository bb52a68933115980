/**
 * ProjectSession Tests
 */

import { createChatSession, describeSession, offerActions, projectStage, resetProject } from './ProjectSession';

describe('projectStage', () => {
  it('follows the project through its stages', () => {
    const session = createChatSession();
    expect(projectStage(session)).toBe('EMPTY');

    session.state.functionalSpec = '{"epics":[]}';
    expect(projectStage(session)).toBe('HAS_SPEC');

    session.state.testPlan = '{"test_cases":[]}';
    expect(projectStage(session)).toBe('HAS_SPEC_AND_PLAN');

    session.state.reviewFeedback = 'Looks fine.';
    expect(projectStage(session)).toBe('REVIEWED');

    session.state.isApproved = true;
    expect(projectStage(session)).toBe('APPROVED');

    session.state.devopsProjectName = 'TodoApp';
    expect(projectStage(session)).toBe('DEVOPS_LINKED');

    session.implementing = true;
    expect(projectStage(session)).toBe('IMPLEMENTING');
  });
});

describe('resetProject', () => {
  it('clears the project but keeps settings', () => {
    const session = createChatSession({ pat: 'test-secret' });
    Object.assign(session.state, { idea: 'todo', functionalSpec: '{}', isApproved: true });

    resetProject(session);

    expect(session.state.idea).toBe('');
    expect(session.state.functionalSpec).toBe('');
    expect(session.state.isApproved).toBe(false);
    expect(session.settings.pat).toBe('test-secret');
  });
});

describe('describeSession', () => {
  it('reports whether a PAT is set without exposing it', () => {
    const session = createChatSession({ pat: 'test-secret' }, 'session-1');
    offerActions(session, [{ name: 'approve_spec', label: 'Set up project', payload: { message: 'Approve' } }]);

    const view = describeSession(session);

    expect(view.id).toBe('session-1');
    expect(view.settings).toEqual({ orgUrl: '', patConfigured: true, codeAgent: 'claude-code' });
    expect(view.pendingActions).toEqual([{ name: 'approve_spec', label: 'Set up project', payload: { message: 'Approve' } }]);
    expect(JSON.stringify(view)).not.toContain('test-secret');
  });
});
