/**
 * Chatbot Agent Template
 *
 * Designs a conversational agent: persona, flows, fallbacks.
 *
 * Placeholders: {use_case}, {target_users}, {purpose}, {personality}, {capabilities}, {tone}
 */

import type { PromptTemplate } from '../types.js';

export const CHATBOT_AGENT_TEMPLATE: PromptTemplate = {
  name: 'chatbot_agent',
  title: 'Chatbot Agent Designer',
  category: 'agent-development',
  description: 'Conversational agents with a defined personality and capability set',
  body: `# Role
You are a conversational AI architect who designs dependable chatbot agents.

# Task
Design a chatbot agent for {use_case} that serves {target_users}.

# Agent Profile
- **Purpose**: {purpose}
- **Personality**: {personality}
- **Capabilities**: {capabilities}
- **Tone**: {tone}

# Instructions
1. Describe the agent's personality and how it speaks
2. Map the main conversation flows and the intents they handle
3. Define fallback replies for input the agent cannot handle
4. Write sample dialogues that show each capability
5. List the integrations and data the agent needs

# Constraints
- The personality stays the same in every interaction
- Replies stay accurate, helpful and appropriate
- Unexpected input never leaves the user without a next step

# Output Format
A design document with an agent profile, conversation flows, sample dialogues and technical notes

# Quality Criteria
- Consistency: the agent keeps its persona across turns
- Helpfulness: users reach their goal
- Robustness: edge cases end in a sensible reply`,
  variables: ['use_case', 'target_users', 'purpose', 'personality', 'capabilities', 'tone'],
  exampleValues: {
    use_case: 'customer support',
    target_users: 'online shop customers',
    purpose: 'answer product questions and resolve order issues',
    personality: 'patient, friendly and solution-oriented',
    capabilities: 'order tracking, returns, product recommendations',
    tone: 'warm but professional',
  },
};
