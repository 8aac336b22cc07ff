import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { type Corpus, type CorpusRecord, corpusFromRecord, corpusToRecord, crawl, validateCorpus } from './src/corpus.js';
import { type RankConfig, loadConfig } from './src/config.js';
import { distributionToRecord } from './src/distribution.js';
import { iteratePagerank } from './src/iteration.js';
import { type RandomSource, Xorshift32, defaultRandom } from './src/random.js';
import { samplePagerank } from './src/sampling.js';
import { transitionModel } from './src/transition.js';

export type RankRecord = Record<string, number>;

export interface DirectoryRanks {
  pages: Record<string, string[]>;
  sampling: RankRecord;
  iteration: RankRecord;
}

type ToolArgs = Record<string, unknown>;

function readCorpus(args: ToolArgs): Corpus {
  const value = args.corpus;
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error("corpus must be an object mapping each page to an array of linked pages");
  }
  const record: CorpusRecord = {};
  for (const [page, links] of Object.entries(value)) {
    if (!Array.isArray(links) || !links.every((link): link is string => typeof link === "string")) {
      throw new Error(`Links of page "${page}" must be an array of strings`);
    }
    record[page] = links;
  }
  return validateCorpus(corpusFromRecord(record));
}

function readString(args: ToolArgs, key: string): string {
  const value = args[key];
  if (typeof value !== "string" || value === "") {
    throw new Error(`${key} must be a non-empty string`);
  }
  return value;
}

function readNumber(args: ToolArgs, key: string, fallback: number): number {
  const value = args[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number") {
    throw new Error(`${key} must be a number`);
  }
  return value;
}

function readRandom(args: ToolArgs): RandomSource {
  const seed = args.seed;
  if (seed === undefined) return defaultRandom;
  if (typeof seed !== "number" || !Number.isInteger(seed)) {
    throw new Error("seed must be an integer");
  }
  return new Xorshift32(seed);
}

function textResult(value: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
}

/**
 * Crawl a directory of HTML pages and rank it with both estimators.
 */
export async function rankDirectory(
  directory: string,
  config: RankConfig,
  random: RandomSource = defaultRandom,
): Promise<DirectoryRanks> {
  const corpus = await crawl(directory);
  return {
    pages: corpusToRecord(corpus),
    sampling: distributionToRecord(samplePagerank(corpus, config.damping, config.samples, random)),
    iteration: distributionToRecord(
      iteratePagerank(corpus, config.damping, config.threshold, { maxIterations: config.maxIterations }),
    ),
  };
}

const corpusSchema = {
  type: "object",
  description: "Map of page name to the names of the pages it links to. A page with no links is treated as linking to every page.",
  additionalProperties: { type: "array", items: { type: "string" } },
};

/**
 * Creates a configured MCP server instance with all tools registered.
 * @param config Defaults for tool arguments (defaults to the PAGERANK_* environment variables)
 */
export function createServer(config: RankConfig = loadConfig()): Server {
  const server = new Server({
    name: "corpus-rank",
    version: "0.1.0",
  }, {
    capabilities: {
      tools: {},
    },
  });

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      {
        name: "transition_model",
        description: "Probability of the random surfer visiting each page next, given its current page",
        inputSchema: {
          type: "object",
          properties: {
            corpus: corpusSchema,
            page: { type: "string", description: "The current page" },
            damping: { type: "number", exclusiveMinimum: 0, exclusiveMaximum: 1, description: `Probability of following a link. Default ${config.damping}` },
          },
          required: ["corpus", "page"],
        },
      },
      {
        name: "sample_pagerank",
        description: "Estimate PageRank from the visit frequencies of a simulated random surfer",
        inputSchema: {
          type: "object",
          properties: {
            corpus: corpusSchema,
            samples: { type: "integer", minimum: 1, description: `Number of pages to sample. Default ${config.samples}` },
            damping: { type: "number", exclusiveMinimum: 0, exclusiveMaximum: 1, description: `Probability of following a link. Default ${config.damping}` },
            seed: { type: "integer", description: "Seed for a reproducible walk. Omit for a random one" },
          },
          required: ["corpus"],
        },
      },
      {
        name: "iterate_pagerank",
        description: "Compute PageRank by iterating the PageRank formula until the ranks converge",
        inputSchema: {
          type: "object",
          properties: {
            corpus: corpusSchema,
            threshold: { type: "number", exclusiveMinimum: 0, description: `Stop once no rank changes by this much. Default ${config.threshold}` },
            damping: { type: "number", exclusiveMinimum: 0, exclusiveMaximum: 1, description: `Probability of following a link. Default ${config.damping}` },
          },
          required: ["corpus"],
        },
      },
      {
        name: "rank_directory",
        description: "Read a directory of HTML pages, extract their links, and rank the pages with both estimators",
        inputSchema: {
          type: "object",
          properties: {
            directory: { type: "string", description: "Path of the directory holding the .html pages" },
            samples: { type: "integer", minimum: 1, description: `Number of pages to sample. Default ${config.samples}` },
            seed: { type: "integer", description: "Seed for a reproducible walk. Omit for a random one" },
          },
          required: ["directory"],
        },
      },
    ],
  };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  if (!args) {
    throw new Error(`No arguments provided for tool: ${name}`);
  }

  switch (name) {
    case "transition_model": {
      const model = transitionModel(readCorpus(args), readString(args, "page"), readNumber(args, "damping", config.damping));
      return textResult(distributionToRecord(model));
    }
    case "sample_pagerank": {
      const ranks = samplePagerank(
        readCorpus(args),
        readNumber(args, "damping", config.damping),
        readNumber(args, "samples", config.samples),
        readRandom(args),
      );
      return textResult(distributionToRecord(ranks));
    }
    case "iterate_pagerank": {
      const ranks = iteratePagerank(
        readCorpus(args),
        readNumber(args, "damping", config.damping),
        readNumber(args, "threshold", config.threshold),
        { maxIterations: config.maxIterations },
      );
      return textResult(distributionToRecord(ranks));
    }
    case "rank_directory": {
      const result = await rankDirectory(
        readString(args, "directory"),
        { ...config, samples: readNumber(args, "samples", config.samples) },
        readRandom(args),
      );
      return textResult(result);
    }
    default:
      throw new Error(`Unknown tool: ${name}`);
  }
});

  return server;
}
