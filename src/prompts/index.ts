/**
 * Prompts Module
 *
 * Centralized exports for agent instructions:
 * - spec-agents: collaborative specification chat
 * - research-agents: issue research group chat
 */

export * from './spec-agents';
export * from './research-agents';
