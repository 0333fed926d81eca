import env from "../config/env";
import { CategoryPageSource } from "../core/pageSource";
import { ImageResolver } from "../core/resolver";
import { SynonymResolver } from "../core/synonyms";
import logger from "../lib/logger";
import { createApp } from "./app";

const app = createApp(new ImageResolver(new CategoryPageSource(), new SynonymResolver()));

const server = app.listen(env.port, () => logger.info(`API running on port: ${env.port}`));

export { app, server };
