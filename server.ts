import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { type Corpus, type CorpusStats, type Page, type RankTable, crawl, corpusStats } from './src/corpus.js';
import { type RankConfig, loadConfig } from './src/config.js';
import { iterateRankWithStats } from './src/iteration.js';
import { createSeededRandom } from './src/random.js';
import { sampleRank } from './src/sampling.js';
import { transitionModel } from './src/transition.js';

export interface CorpusListing {
  pages: { page: Page; links: Page[] }[];
  stats: CorpusStats;
}

export interface RankResult {
  ranks: Record<Page, number>;
}

export interface IterationRankResult extends RankResult {
  iterations: number;
  delta: number;
}

type ToolArgs = Record<string, unknown>;

function toRecord(table: Map<Page, number>): Record<Page, number> {
  const out: Record<Page, number> = {};
  for (const page of [...table.keys()].sort()) {
    out[page] = table.get(page) ?? 0;
  }
  return out;
}

function optionalNumber(args: ToolArgs, key: string): number | undefined {
  const value = args[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number") {
    throw new Error(`Argument "${key}" must be a number`);
  }
  return value;
}

function requiredString(args: ToolArgs, key: string): string {
  const value = args[key];
  if (typeof value !== "string") {
    throw new Error(`Argument "${key}" must be a string`);
  }
  return value;
}

// The CorpusRanker crawls the corpus once and runs both estimators over it
export class CorpusRanker {
  private config: RankConfig;
  private corpusDir: string;
  private corpus?: Promise<Corpus>;

  constructor(corpusDir?: string, config: RankConfig = loadConfig()) {
    this.config = config;
    this.corpusDir = corpusDir ?? config.corpusDir;
  }

  private loadCorpus(): Promise<Corpus> {
    if (!this.corpus) {
      this.corpus = crawl(this.corpusDir);
      // A failed crawl is not cached; the next call retries
      void this.corpus.catch(() => { this.corpus = undefined; });
    }
    return this.corpus;
  }

  async getCorpus(): Promise<CorpusListing> {
    const corpus = await this.loadCorpus();
    const pages = [...corpus.keys()].sort().map(page => ({
      page,
      links: [...(corpus.get(page) ?? [])].sort(),
    }));
    return { pages, stats: corpusStats(corpus) };
  }

  async transition(page: Page, damping: number = this.config.damping): Promise<RankResult> {
    const corpus = await this.loadCorpus();
    return { ranks: toRecord(transitionModel(corpus, page, damping)) };
  }

  async sample(damping: number = this.config.damping, samples: number = this.config.samples, seed: number | undefined = this.config.seed): Promise<RankResult> {
    const corpus = await this.loadCorpus();
    const random = seed === undefined ? Math.random : createSeededRandom(seed);
    const ranks: RankTable = sampleRank(corpus, { damping, samples, random });
    return { ranks: toRecord(ranks) };
  }

  async iterate(damping: number = this.config.damping, threshold: number = this.config.threshold, maxIterations: number = this.config.maxIterations): Promise<IterationRankResult> {
    const corpus = await this.loadCorpus();
    const result = iterateRankWithStats(corpus, { damping, threshold, maxIterations });
    return { ranks: toRecord(result.ranks), iterations: result.iterations, delta: result.delta };
  }
}

/**
 * Creates a configured MCP server instance with all tools registered.
 * @param corpusDir Optional corpus directory (defaults to CORPUS_DIR env var or the working directory)
 */
export function createServer(corpusDir?: string): Server {
  const ranker = new CorpusRanker(corpusDir);

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
          name: "get_corpus",
          description: "List every page of the corpus with its outbound links, plus page, link and dead-end counts",
          inputSchema: {
            type: "object",
            properties: {},
          },
        },
        {
          name: "transition_model",
          description: "Probability distribution over the next page a random surfer visits from the given page",
          inputSchema: {
            type: "object",
            properties: {
              page: { type: "string", description: "Page (file name) the surfer is on" },
              damping: { type: "number", minimum: 0, maximum: 1, description: "Probability of following a link. Default 0.85." },
            },
            required: ["page"],
          },
        },
        {
          name: "sample_pagerank",
          description: "Estimate PageRank as the visit frequency of a random surfer walk",
          inputSchema: {
            type: "object",
            properties: {
              damping: { type: "number", minimum: 0, maximum: 1, description: "Probability of following a link. Default 0.85." },
              samples: { type: "integer", minimum: 1, description: "Number of pages visited. Default 10000." },
              seed: { type: "integer", description: "Seed for a reproducible walk" },
            },
          },
        },
        {
          name: "iterate_pagerank",
          description: "Compute PageRank by iterating the PageRank equations until no page changes by more than the threshold",
          inputSchema: {
            type: "object",
            properties: {
              damping: { type: "number", minimum: 0, maximum: 1, description: "Probability of following a link. Default 0.85." },
              threshold: { type: "number", exclusiveMinimum: 0, description: "Convergence threshold. Default 0.001." },
              maxIterations: { type: "integer", minimum: 1, description: "Sweep cap. Default 10000." },
            },
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name } = request.params;
    const args: ToolArgs = request.params.arguments ?? {};

    switch (name) {
      case "get_corpus":
        return { content: [{ type: "text", text: JSON.stringify(await ranker.getCorpus(), null, 2) }] };
      case "transition_model":
        return { content: [{ type: "text", text: JSON.stringify(await ranker.transition(requiredString(args, "page"), optionalNumber(args, "damping")), null, 2) }] };
      case "sample_pagerank": {
        const result = await ranker.sample(optionalNumber(args, "damping"), optionalNumber(args, "samples"), optionalNumber(args, "seed"));
        return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
      }
      case "iterate_pagerank": {
        const result = await ranker.iterate(optionalNumber(args, "damping"), optionalNumber(args, "threshold"), optionalNumber(args, "maxIterations"));
        return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
      }
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  });

  return server;
}
