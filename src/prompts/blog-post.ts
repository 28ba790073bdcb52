/**
 * Blog Post Template
 *
 * Long-form article with a headline, sections and a call to action.
 *
 * Placeholders: {topic}, {audience}, {num_sections}, {tone}, {word_count}
 */

import type { PromptTemplate } from '../types.js';

export const BLOG_POST_TEMPLATE: PromptTemplate = {
  name: 'blog_post',
  title: 'Blog Post Writer',
  category: 'content-creation',
  description: 'Engaging, search-friendly blog posts on any topic',
  body: `# Role
You are an expert content writer and blogger who writes engaging, search-friendly articles.

# Task
Write a blog post about {topic} for {audience}.

# Instructions
1. Open with a headline that makes the reader want to click
2. Hook the reader in the first paragraph
3. Develop {num_sections} main sections, each under its own subheading
4. Support each point with an example or a concrete figure
5. Close with a short conclusion and a call to action
6. Keep a {tone} tone from start to finish

# Constraints
- Target length: {word_count} words
- Prefer short paragraphs and plain language
- Give the reader at least one takeaway they can act on

# Output Format
Markdown with headings, emphasis and lists where they help

# Quality Criteria
- Engagement: the post holds attention from headline to conclusion
- Value: the reader learns something useful
- Readability: the structure is easy to scan`,
  variables: ['topic', 'audience', 'num_sections', 'tone', 'word_count'],
  exampleValues: {
    topic: 'artificial intelligence in healthcare',
    audience: 'healthcare professionals',
    num_sections: '5',
    tone: 'professional yet accessible',
    word_count: '1500',
  },
};
