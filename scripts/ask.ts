import dotenv from 'dotenv';

import { loadConfig } from '../src/config';
import { createQueryEngine } from '../src/engine';
import { createLogger, setLogLevel } from '../src/util/logger';

dotenv.config();

const logger = createLogger('ask');

const USAGE = 'Usage: npm run ask -- <document-url> "<question>" ["<question>" ...]';

const main = async (): Promise<void> => {
  const [documentUrl, ...questions] = process.argv.slice(2);

  if (!documentUrl || questions.length === 0) {
    throw new Error(USAGE);
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);

  logger.info(`VECTOR_STORE=${config.vectorStore.kind} EMBEDDING_PROVIDER=${config.embedding.provider} MODEL=${config.openai.model}`);

  const engine = createQueryEngine(config);
  const answers = await engine.process(documentUrl, questions);

  console.log(JSON.stringify({ answers }, null, 2));
};

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
