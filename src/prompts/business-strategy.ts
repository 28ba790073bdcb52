/**
 * Business Strategy Template
 *
 * Situation analysis through to roadmap and KPIs.
 *
 * Placeholders: {industry}, {strategy_type}, {business_description}, {target_market},
 * {current_situation}, {goals}, {timeline}
 */

import type { PromptTemplate } from '../types.js';

export const BUSINESS_STRATEGY_TEMPLATE: PromptTemplate = {
  name: 'business_strategy',
  title: 'Business Strategy Developer',
  category: 'business',
  description: 'Business strategies with objectives, roadmap and success metrics',
  body: `# Role
You are a business strategist with deep experience in {industry}.

# Task
Develop a {strategy_type} strategy for {business_description}.

# Business Context
- **Industry**: {industry}
- **Target Market**: {target_market}
- **Current Situation**: {current_situation}
- **Goals**: {goals}
- **Timeline**: {timeline}

# Instructions
1. Analyze the current situation with SWOT or a similar framework
2. Set measurable objectives
3. Choose the strategies and tactics that reach them
4. Lay out an implementation roadmap with milestones
5. Define the KPIs that show progress
6. Name the main risks and how to mitigate them

# Constraints
- Every recommendation must be realistic for the stated resources
- Account for competitors and market conditions
- Keep recommendations actionable

# Output Format
A strategy document with an executive summary, situation analysis, objectives, action plan and metrics

# Quality Criteria
- Feasibility: the plan can be carried out
- Alignment: the plan serves the stated goals
- Impact: the plan can move the business measurably`,
  variables: [
    'industry',
    'strategy_type',
    'business_description',
    'target_market',
    'current_situation',
    'goals',
    'timeline',
  ],
  exampleValues: {
    industry: 'sustainable fashion',
    strategy_type: 'market entry',
    business_description: 'an eco-friendly clothing brand',
    target_market: 'environmentally conscious shoppers aged 25-40',
    current_situation: 'established online store, no physical retail yet',
    goals: 'open three stores in major cities',
    timeline: '18 months',
  },
};
