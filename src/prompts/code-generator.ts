/**
 * Code Generator Template
 *
 * Production-ready code with documentation and usage examples.
 *
 * Placeholders: {programming_language}, {domain}, {code_type}, {functionality},
 * {requirements}, {coding_standard}
 */

import type { PromptTemplate } from '../types.js';

export const CODE_GENERATOR_TEMPLATE: PromptTemplate = {
  name: 'code_generator',
  title: 'Code Generator',
  category: 'technical',
  description: 'Clean, documented code for a specific task',
  body: `# Role
You are a senior software engineer fluent in {programming_language} with experience in {domain}.

# Task
Write {code_type} in {programming_language} that {functionality}.

# Requirements
{requirements}

# Instructions
1. Follow {programming_language} conventions and the {coding_standard} standard
2. Document every public function and class
3. Validate input and handle errors explicitly
4. Cover the edge cases the requirements imply
5. Finish with a short usage example

# Constraints
- The code must run as written
- Prefer readability over cleverness
- Add no external dependencies unless the requirements ask for them

# Output Format
Complete code in fenced blocks, followed by usage examples

# Quality Criteria
- Correctness: the code does what the task describes
- Readability: another engineer can maintain it
- Efficiency: no needless work or allocation`,
  variables: ['programming_language', 'domain', 'code_type', 'functionality', 'requirements', 'coding_standard'],
  exampleValues: {
    programming_language: 'Python',
    domain: 'data processing',
    code_type: 'a class',
    functionality: 'reads CSV files, validates each row and reports summary statistics',
    requirements: '- Support comma and semicolon delimiters\n- Skip rows with missing values\n- Export the summary as JSON',
    coding_standard: 'PEP 8',
  },
};
