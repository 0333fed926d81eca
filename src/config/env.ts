import { config } from "dotenv";

const envFiles: Record<string, string> = {
  production: ".env",
  test: ".env.test",
};

// Load environment variables FIRST
config({ path: envFiles[process.env.NODE_ENV ?? ""] ?? ".env.local" });

const env = {
  port: Number(process.env.PORT ?? 3000),
  logLevel: process.env.LOG_LEVEL ?? "info",
  categoryBaseUrl:
    process.env.CATEGORY_BASE_URL ?? "https://commons.wikimedia.org/wiki/Category:",
  thesaurus: {
    apiUrl: process.env.THESAURUS_API_URL ?? "https://words.bighugelabs.com/api/2/",
    // Without a key the synonym fallback is skipped
    apiKey: process.env.THESAURUS_API_KEY ?? "",
  },
};

export default env;
