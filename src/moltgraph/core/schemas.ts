import { z } from "zod";

const flag = (fallback: boolean) =>
  z
    .enum(["0", "1", "true", "false", "yes", "no"])
    .default(fallback ? "1" : "0")
    .transform(v => v === "1" || v === "true" || v === "yes");

const count = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const seconds = (fallback: number) => z.coerce.number().positive().default(fallback);

// Environment variables understood by the crawler. Unknown variables are ignored.
export const EnvSchema = z
  .object({
    MOLTBOOK_API_KEY: z.string().min(1).describe("Bearer token for authenticated endpoints"),
    MOLTBOOK_BASE_URL: z.string().url().default("https://www.moltbook.com/api/v1"),
    MOLTBOOK_WEB_URL: z.string().url().default("https://www.moltbook.com"),
    USER_AGENT: z.string().min(1).default("MoltGraphCrawler/0.1"),

    GRAPH_STORE: z.enum(["neo4j", "jsonl"]).default("neo4j"),
    NEO4J_URI: z.string().min(1).optional(),
    NEO4J_USER: z.string().min(1).optional(),
    NEO4J_PASSWORD: z.string().min(1).optional(),
    NEO4J_DATABASE: z.string().min(1).optional(),
    GRAPH_DATA_PATH: z.string().min(1).optional(),

    REQUESTS_PER_MINUTE: z.coerce.number().int().min(1).default(80),
    MAX_RETRIES: z.coerce.number().int().min(1).default(8),
    MAX_RATE_LIMIT_WAITS: count(30),
    RETRY_BACKOFF_SECONDS: seconds(1.5),
    RETRY_BACKOFF_MAX_SECONDS: seconds(60),
    RATE_LIMIT_COOLDOWN_SECONDS: seconds(30),
    HTTP_TIMEOUT_SECONDS: seconds(60),

    POSTS_PAGE_SIZE: z.coerce.number().int().min(1).default(50),
    POSTS_MAX_PAGES: count(0).describe("0 disables the per-view page cap"),
    MAX_STALE_PAGES: z.coerce.number().int().min(1).default(4),
    MAX_REPEAT_PAGES: z.coerce.number().int().min(1).default(2),
    POST_VIEWS: z.string().default("new:|top:day|top:week|top:month|top:year|top:all|hot:day|hot:week"),
    INCREMENTAL_VIEWS: z.string().default("new:"),

    FETCH_POST_DETAILS: flag(false),
    CRAWL_COMMENTS: flag(true),
    COMMENTS_FROM_POST_DETAILS: flag(true),
    COMMENTS_LIMIT_PER_POST: z.coerce.number().int().min(1).default(200),

    SUBMOLT_TOP_LIMIT: count(100),
    ENRICH_SUBMOLTS: flag(false),
    ENRICH_SUBMOLTS_LIMIT: count(0),
    CRAWL_SUBMOLT_FEEDS: flag(false),
    SUBMOLT_FEED_MAX_PAGES: count(0),
    SUBMOLT_FEED_SORT: z.string().min(1).default("new"),
    SUBMOLT_FEED_LIMIT: count(0),

    REFRESH_MODERATORS: flag(true),
    MODERATOR_SUBMOLTS_LIMIT: count(500),

    FETCH_AGENT_PROFILES: flag(true),
    PROFILE_LIMIT: count(0),
    PROFILE_REFRESH_DAYS: count(7),
    PROFILE_REFRESH_LIMIT: count(500),

    FEED_SNAPSHOT: flag(true),
    FEED_SNAPSHOT_SORT: z.string().min(1).default("hot"),
    FEED_SNAPSHOT_LIMIT: z.coerce.number().int().min(1).default(100),

    SCRAPE_AGENT_HTML: flag(false),
    CRAWL_ID: z.string().min(1).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.GRAPH_STORE !== "neo4j") return;
    for (const key of ["NEO4J_URI", "NEO4J_USER", "NEO4J_PASSWORD"] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: "Required when GRAPH_STORE=neo4j",
        });
      }
    }
  });

export type Env = z.infer<typeof EnvSchema>;
