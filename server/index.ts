import { createApp } from './app.js';
import { loadConfig } from './lib/config.js';
import { openDb } from './lib/db.js';
import { describeError } from './lib/errors.js';
import { checkLLM, createCompletion, createLlmClient, modelConfigFrom } from './lib/llm.js';
import { createMentor } from './lib/mentor.js';
import { PromptAssembler, loadPromptConfig } from './lib/prompts.js';

function main(): void {
  // Config, prompts and database are all fatal if missing.
  const config = loadConfig();
  const prompts = new PromptAssembler(loadPromptConfig(config.promptsPath));
  const db = openDb(config.dbPath);

  const complete = createCompletion(createLlmClient(config.llm));
  const model = modelConfigFrom(config.llm);

  const mentor = createMentor(db, prompts, complete, {
    model,
    historyWindow: config.historyWindow,
    timeoutMs: config.llm.timeoutMs,
  });

  const app = createApp({
    mentor,
    roles: prompts.listRoles(),
    checkLlm: () => checkLLM(complete, model, config.llm.timeoutMs),
  });

  app.listen(config.port, () => {
    console.log(`Mentor running on http://localhost:${config.port}`);
    console.log(`LLM: ${config.llm.provider} / ${config.llm.deployment}`);
    console.log(`Environment: ${config.env}`);
  });
}

try {
  main();
} catch (error: unknown) {
  console.error('Startup error:', describeError(error));
  process.exit(1);
}
