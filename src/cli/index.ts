#!/usr/bin/env node
import { getProductionContainer } from '../container.production.js';
import { parseCliArgs, USAGE } from './args.js';
import { describeError } from './error-handler.js';
import { renderJson, renderText } from './render.js';

async function main(argv: string[]): Promise<number> {
  const options = parseCliArgs(argv);
  if (options.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const container = await getProductionContainer({
    knowledgeBasePath: options.knowledgeBasePath,
    referenceCorpusPath: options.referenceCorpusPath,
    disableReferences: options.disableReferences,
    composer: options.composer,
  });

  try {
    const response = await container.advisorService.advise({
      text: options.question,
      metadata: options.metadata,
    });
    process.stdout.write(`${options.json ? renderJson(response) : renderText(response)}\n`);
    return 0;
  } finally {
    await container.logProvider.flush();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`${JSON.stringify(describeError(err), null, 2)}\n`);
    process.exitCode = 1;
  }
);
