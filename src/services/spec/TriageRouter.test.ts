/**
 * TriageRouter Tests
 */

import { createSpecAgents } from '../../agents';
import { SPEC_AGENT_NAMES, TRIAGE_AGENT_PROMPT } from '../../prompts';
import { ScriptedProvider } from '../../tests/ScriptedProvider';
import { createChatSession } from './ProjectSession';
import { TriageRouter, containsLabel, parseRevisionTarget, parseRouteDecision } from './TriageRouter';

describe('parseRouteDecision', () => {
  it.each([
    ['DEFINITION', 'DEFINITION'],
    ['"test"', 'TEST'],
    ['Label: REVIEW', 'REVIEW'],
    ['AZURE_DEVOPS', 'AZURE_DEVOPS'],
    ['DEVOPS', 'DEVOPS'],
    ['REVISE_FUNCTIONAL_SPEC', 'REVISE_FUNCTIONAL_SPEC'],
    ['REVISE_TEST_PLAN', 'REVISE_TEST_PLAN'],
    ['implement', 'IMPLEMENT'],
    ['APPROVE', 'APPROVE'],
    ['SMALL_TALK', 'SMALL_TALK'],
    ['GENERAL', 'GENERAL'],
    ['no idea', 'GENERAL'],
  ])('maps %s to %s', (raw, route) => {
    expect(parseRouteDecision(raw).route).toBe(route);
  });

  it('prefers the earlier label when several appear', () => {
    expect(parseRouteDecision('TEST or REVIEW').route).toBe('TEST');
  });

  it('does not read labels out of longer labels', () => {
    expect(parseRouteDecision('REVISE_TEST_PLAN').route).toBe('REVISE_TEST_PLAN');
    expect(parseRouteDecision('AZURE_DEVOPS').route).toBe('AZURE_DEVOPS');
  });

  it('keeps the raw reply', () => {
    expect(parseRouteDecision(' approve \n').raw).toBe(' approve \n');
  });
});

describe('parseRevisionTarget', () => {
  it('maps revision labels', () => {
    expect(parseRevisionTarget('REVISE_FUNCTIONAL_SPEC')).toBe('REVISE_FUNCTIONAL_SPEC');
    expect(parseRevisionTarget('revise_test_plan')).toBe('REVISE_TEST_PLAN');
    expect(parseRevisionTarget('SMALL_TALK')).toBe('SMALL_TALK');
  });

  it('answers UNKNOWN otherwise', () => {
    expect(parseRevisionTarget('UNKNOWN')).toBe('UNKNOWN');
    expect(parseRevisionTarget('the backlog, probably')).toBe('UNKNOWN');
  });
});

describe('containsLabel', () => {
  it('matches whole tokens only', () => {
    expect(containsLabel('TEST', 'TEST')).toBe(true);
    expect(containsLabel('"TEST".', 'TEST')).toBe(true);
    expect(containsLabel('TESTS', 'TEST')).toBe(false);
    expect(containsLabel('REVISE_TEST_PLAN', 'TEST')).toBe(false);
  });
});

describe('TriageRouter', () => {
  it('keeps the triage thread on the session between turns', async () => {
    const provider = new ScriptedProvider().script(TRIAGE_AGENT_PROMPT, 'DEFINITION', 'TEST');
    const router = new TriageRouter(createSpecAgents(provider)[SPEC_AGENT_NAMES.TRIAGE]);
    const session = createChatSession();

    const first = await router.classify(session, 'A todo app');
    const second = await router.classify(session, 'Now the tests');

    expect(first.route).toBe('DEFINITION');
    expect(second.route).toBe('TEST');

    const calls = provider.callsTo(TRIAGE_AGENT_PROMPT);
    expect(calls).toHaveLength(2);
    expect(calls[1].messages).toHaveLength(3);
    expect(calls[1].messages[1]).toEqual({ role: 'assistant', content: 'DEFINITION' });
    expect(session.threads.get(SPEC_AGENT_NAMES.TRIAGE)?.messages).toHaveLength(4);
  });

  it('describes the project state in the prompt', async () => {
    const provider = new ScriptedProvider().script(TRIAGE_AGENT_PROMPT, 'APPROVE');
    const router = new TriageRouter(createSpecAgents(provider)[SPEC_AGENT_NAMES.TRIAGE]);
    const session = createChatSession();
    session.state.functionalSpec = '{"epics":[]}';

    await router.classify(session, 'yes');

    const prompt = provider.lastPromptTo(TRIAGE_AGENT_PROMPT);
    expect(prompt).toContain('User Request: yes');
    expect(prompt).toContain('- Has Functional Spec: Yes');
    expect(prompt).toContain('- Has Test Plan: No');
  });

  it('propagates provider failures', async () => {
    const provider = new ScriptedProvider().script(TRIAGE_AGENT_PROMPT, new Error('quota exceeded'));
    const router = new TriageRouter(createSpecAgents(provider)[SPEC_AGENT_NAMES.TRIAGE]);

    await expect(router.classify(createChatSession(), 'hi')).rejects.toThrow('quota exceeded');
  });
});
