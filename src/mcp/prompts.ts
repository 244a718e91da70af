// This module defines the prompt catalog and the per-prompt message builders behind prompts/get.

import type { McpPrompt, McpPromptMessage } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';

type PromptArguments = Record<string, string>;

interface PromptDefinition extends McpPrompt {
  // Candidate values offered by completion/complete, keyed by argument name.
  completions: Record<string, readonly string[]>;
  build: (args: PromptArguments) => McpPromptMessage[];
}

const SUMMARY_STYLES = ['brief', 'detailed', 'bullet-points'] as const;
const RESEARCH_DEPTHS = ['quick', 'standard', 'thorough'] as const;

const COMMON_CITIES = [
  'Amsterdam',
  'Athens',
  'Barcelona',
  'Berlin',
  'Boston',
  'Cairo',
  'Chicago',
  'Dublin',
  'Hamburg',
  'Lisbon',
  'London',
  'Los Angeles',
  'Madrid',
  'Munich',
  'New York',
  'Paris',
  'Rome',
  'San Francisco',
  'Sydney',
  'Tokyo',
  'Toronto',
  'Vienna',
  'Zurich'
] as const;

function userMessage(text: string): McpPromptMessage {
  return {
    role: 'user',
    content: { type: 'text', text }
  };
}

const PROMPTS: readonly PromptDefinition[] = [
  {
    name: 'summarize_document',
    description: 'Fetch a document with fetch_document and summarize it.',
    arguments: [
      { name: 'url', description: 'Absolute http(s) URL of the document.', required: true },
      { name: 'style', description: `Summary style: ${SUMMARY_STYLES.join(', ')}.`, required: false }
    ],
    completions: { style: SUMMARY_STYLES },
    build: (args) => {
      const style = args.style ?? 'brief';
      return [
        userMessage(
          `Use the fetch_document tool to read ${args.url}, then write a ${style} summary of it. ` +
            'Mention the document title if it has one and cite the URL.'
        )
      ];
    }
  },
  {
    name: 'weather_report',
    description: 'Produce a short weather report for one city.',
    arguments: [
      { name: 'city', description: 'City name.', required: true },
      { name: 'units', description: 'metric or imperial.', required: false }
    ],
    completions: { city: COMMON_CITIES, units: ['metric', 'imperial'] },
    build: (args) => {
      const units = args.units ?? 'metric';
      return [
        userMessage(
          `Call get_current_weather for ${args.city} with units=${units} and report the conditions, ` +
            'temperature, feels-like temperature and wind in two or three sentences.'
        )
      ];
    }
  },
  {
    name: 'research_topic',
    description: 'Research a topic with web search and answer with sources.',
    arguments: [
      { name: 'topic', description: 'Topic or question to research.', required: true },
      { name: 'depth', description: `Research depth: ${RESEARCH_DEPTHS.join(', ')}.`, required: false }
    ],
    completions: { depth: RESEARCH_DEPTHS },
    build: (args) => {
      const depth = args.depth ?? 'standard';
      const searches = depth === 'quick' ? 1 : depth === 'thorough' ? 3 : 2;
      return [
        userMessage(
          `Research "${args.topic}". Run up to ${searches} search_web queries, read the most relevant result ` +
            'with fetch_document when needed, and answer with a list of the source URLs you used.'
        )
      ];
    }
  }
];

export function listPrompts(): McpPrompt[] {
  return PROMPTS.map(({ name, description, arguments: args }) => ({
    name,
    description,
    arguments: args.map((argument) => ({ ...argument }))
  }));
}

export function findPrompt(name: string): PromptDefinition | undefined {
  return PROMPTS.find((prompt) => prompt.name === name);
}

// This helper keeps only string-valued arguments; MCP prompt arguments are strings on the wire.
function normalizePromptArguments(raw: unknown): PromptArguments {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return {};
  }

  const args: PromptArguments = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      args[key] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      args[key] = String(value);
    }
  }
  return args;
}

// This function renders one prompt after checking its required arguments.
export function getPrompt(
  name: string,
  rawArguments: unknown
): { description: string; messages: McpPromptMessage[] } {
  const prompt = findPrompt(name);
  if (!prompt) {
    throw new AppError(400, 'invalid_params', `Unknown prompt: ${name}`);
  }

  const args = normalizePromptArguments(rawArguments);
  const missing = prompt.arguments
    .filter((argument) => argument.required && !args[argument.name]?.trim())
    .map((argument) => argument.name);

  if (missing.length > 0) {
    throw new AppError(400, 'invalid_params', `Prompt ${name} is missing required arguments: ${missing.join(', ')}.`, {
      missing
    });
  }

  return {
    description: prompt.description,
    messages: prompt.build(args)
  };
}
