import { appConfig } from "../config.js";
import { describeError } from "../errors.js";
import { loadCorpus } from "../indexing/corpusLoader.js";
import { createIndexBuilder, getIndexStoreSingleton } from "../runtime/qaRuntime.js";
import { logger } from "../utils/logger.js";

async function main(): Promise<void> {
  const corpusPath = process.argv[2] ?? appConfig.CORPUS_PATH;
  const documents = await loadCorpus(corpusPath, { minLength: appConfig.MIN_DOCUMENT_LENGTH });

  const store = getIndexStoreSingleton();
  try {
    const { stats } = await createIndexBuilder(store).build(documents);
    logger.info({ corpusPath, indexPath: appConfig.INDEX_DB_PATH, ...stats }, "Index build complete");
  } finally {
    store.close();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error, reason: describeError(error) }, "Index build failed");
  process.exitCode = 1;
});
