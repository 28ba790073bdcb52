/**
 * Story Writer Template
 *
 * Placeholders: {genre}, {story_type}, {premise}, {setting}, {characters}, {tone},
 * {length}, {audience}
 */

import type { PromptTemplate } from '../types.js';

export const STORY_WRITER_TEMPLATE: PromptTemplate = {
  name: 'story_writer',
  title: 'Creative Story Writer',
  category: 'creative',
  description: 'Stories and narratives in a chosen genre',
  body: `# Role
You are a storyteller with a feel for {genre}.

# Task
Write a {story_type} in the {genre} genre about {premise}.

# Story Parameters
- **Setting**: {setting}
- **Characters**: {characters}
- **Tone**: {tone}
- **Length**: {length}
- **Audience**: {audience}

# Instructions
1. Open with a scene that hooks the reader
2. Give every main character a clear motivation
3. Raise the tension steadily toward a climax
4. Use concrete sensory detail
5. Let dialogue reveal character and move the plot
6. End with a resolution that pays off the premise

# Constraints
- Keep one consistent point of view
- Show rather than tell
- Respect the genre while avoiding its clichés

# Output Format
The complete story in prose paragraphs with correctly formatted dialogue

# Quality Criteria
- Engagement: the reader wants to keep going
- Character: the characters feel real
- Coherence: the plot holds together`,
  variables: ['genre', 'story_type', 'premise', 'setting', 'characters', 'tone', 'length', 'audience'],
  exampleValues: {
    genre: 'science fiction',
    story_type: 'short story',
    premise: 'a scientist who finds a way to message a parallel universe',
    setting: 'a near-future research station',
    characters: 'Dr. Ana Reyes and her doubtful colleague Tom',
    tone: 'thoughtful with moments of wonder',
    length: '2000 to 3000 words',
    audience: 'adult science fiction readers',
  },
};
