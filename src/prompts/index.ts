/**
 * @fileoverview Built-in prompt templates
 *
 * Each template is in its own file for easy editing and iteration.
 * Import from here for convenience.
 */

import type { PromptTemplate } from '../types.js';
import { BLOG_POST_TEMPLATE } from './blog-post.js';
import { BUSINESS_STRATEGY_TEMPLATE } from './business-strategy.js';
import { CHATBOT_AGENT_TEMPLATE } from './chatbot-agent.js';
import { CODE_GENERATOR_TEMPLATE } from './code-generator.js';
import { DATA_ANALYST_TEMPLATE } from './data-analyst.js';
import { STORY_WRITER_TEMPLATE } from './story-writer.js';
import { TUTORIAL_CREATOR_TEMPLATE } from './tutorial-creator.js';

export {
  BLOG_POST_TEMPLATE,
  BUSINESS_STRATEGY_TEMPLATE,
  CHATBOT_AGENT_TEMPLATE,
  CODE_GENERATOR_TEMPLATE,
  DATA_ANALYST_TEMPLATE,
  STORY_WRITER_TEMPLATE,
  TUTORIAL_CREATOR_TEMPLATE,
};

/** Registration order is listing order */
export const BUILT_IN_TEMPLATES: readonly PromptTemplate[] = [
  BLOG_POST_TEMPLATE,
  CHATBOT_AGENT_TEMPLATE,
  TUTORIAL_CREATOR_TEMPLATE,
  BUSINESS_STRATEGY_TEMPLATE,
  CODE_GENERATOR_TEMPLATE,
  DATA_ANALYST_TEMPLATE,
  STORY_WRITER_TEMPLATE,
];
