#!/usr/bin/env node
// src/runner.ts
// CLI: run the training pipeline on a profile file.
//   trainflow --profile path/to/profile.json [--confirm] [--model name] [--max-retries N]
// Provider, model and retry budgets come from the environment (.env is loaded) unless overridden.
import 'dotenv/config';
import fs from 'node:fs';
import { loadConfig } from './config.js';
import { PipelineError } from './errors.js';
import { OpenAIChatCompletions } from './llm/openai.js';
import { OpenAIResponses } from './llm/openai_responses.js';
import type { LLMProvider } from './llm/provider.js';
import { createStructuredCaller } from './llm/structured.js';
import { COLOR } from './log.js';
import { runTrainingPipeline } from './pipelines/training/graph.js';
import { buildToolRegistry } from './tools/registry.js';

interface CliArgs {
  profilePath?: string;
  confirm: boolean;
  model?: string;
  maxRetries?: number;
}

function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = { confirm: false };
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    const eq = a.indexOf('=');
    const flag = eq > 0 ? a.slice(0, eq) : a;
    const value = () => (eq > 0 ? a.slice(eq + 1) : argv[++i]);
    if (flag === '--profile') out.profilePath = value();
    else if (flag === '--confirm') out.confirm = true;
    else if (flag === '--model') out.model = value();
    else if (flag === '--max-retries') {
      const n = Number(value());
      if (!Number.isInteger(n) || n < 0) throw new Error('--max-retries expects a non-negative integer');
      out.maxRetries = n;
    }
    else throw new Error(`Unknown argument: ${a}`);
  }
  return out;
}

function readProfile(path: string): unknown {
  const text = fs.readFileSync(path, 'utf8');
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new Error(`Failed to parse JSON file '${path}': ${e instanceof Error ? e.message : String(e)}`);
  }
}

async function main() {
  const args = parseArgs(process.argv);
  if (!args.profilePath) {
    console.error('Usage: trainflow --profile path/to/profile.json [--confirm] [--model name] [--max-retries N]');
    process.exit(2);
  }

  const config = loadConfig();
  if (!config.apiKey) {
    console.warn('[warn] OPENAI_API_KEY not set. Steps using the LLM will fail.');
  }
  const provider: LLMProvider = config.apiStyle === 'responses'
    ? new OpenAIResponses(config.apiKey || 'DUMMY', config.baseUrl)
    : new OpenAIChatCompletions(config.apiKey || 'DUMMY', config.baseUrl);

  const call = createStructuredCaller({
    provider,
    model: args.model ?? config.model,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    maxRetries: args.maxRetries ?? config.maxRetries,
    transportRetries: config.transportRetries,
    retryDelayMs: config.retryDelayMs,
    timeoutMs: config.timeoutMs
  });

  const result = await runTrainingPipeline(
    { user_profile: readProfile(args.profilePath), user_confirmation: args.confirm },
    { call, tools: buildToolRegistry() }
  );

  console.log('\n[State]');
  console.log(JSON.stringify(result.state, null, 2));
  if (result.verdict && result.verdict !== 'pass') {
    console.log(COLOR.yellow(`\n[evaluation] verdict=${result.verdict}: review before acting on this plan`));
  }
  console.log(`\n[done] ${result.trace.length} step(s), ended at ${result.terminatedBy}`);
}

main().catch(err => {
  if (err instanceof PipelineError) {
    console.error(`[fatal] step ${err.stepId}:`, err.cause instanceof Error ? `${err.cause.name}: ${err.cause.message}` : err.cause);
  } else {
    console.error('[fatal]', err);
  }
  process.exit(1);
});
