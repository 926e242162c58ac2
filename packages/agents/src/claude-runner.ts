/**
 * Claude Code CLI Runner
 *
 * Runs Claude Code in print mode as a delegated sub-agent and reads back its
 * JSON result message.
 */

import { z } from 'zod';
import { createLogger, DELEGATED_AGENT_SETTINGS } from '@waypost/core';
import { runCommand, type CommandRunner } from './command-runner.js';

const logger = createLogger('claude-runner');

export interface ClaudeRunnerOptions {
  prompt: string;
  workDir?: string;
  binary?: string;
  model?: string;
  maxTurns?: number;
  timeout?: number;
  systemPrompt?: string;
  allowedTools?: string[];
  maxOutputSize?: number;
  /** Process runner, replaced in tests */
  runner?: CommandRunner;
}

export interface AgentOutput {
  success: boolean;
  result: string;
  isError: boolean;
  exitCode: number | null;
  inputTokens: number;
  outputTokens: number;
  totalCost: number | null;
  truncated: boolean;
  timedOut: boolean;
  stderr: string;
  duration: number;
}

const usageSchema = z.object({
  input_tokens: z.number().default(0),
  output_tokens: z.number().default(0),
  cache_creation_input_tokens: z.number().default(0),
  cache_read_input_tokens: z.number().default(0),
});

// --output-format json emits a single result message
export const resultMessageSchema = z.object({
  type: z.literal('result'),
  subtype: z.string().optional(),
  is_error: z.boolean().default(false),
  result: z.string().default(''),
  total_cost_usd: z.number().optional(),
  usage: usageSchema.optional(),
});

export type ResultMessage = z.output<typeof resultMessageSchema>;

function tryParse(text: string): ResultMessage | null {
  try {
    const parsed = resultMessageSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch {
    return null; // not JSON
  }
}

/**
 * Find the result message in Claude Code output. Accepts a single JSON
 * document or line-delimited messages, where the last result line wins.
 */
export function parseResultMessage(stdout: string): ResultMessage | null {
  const whole = tryParse(stdout.trim());
  if (whole) return whole;

  const lines = stdout.split('\n').filter((line) => line.trim());
  for (let i = lines.length - 1; i >= 0; i--) {
    const message = tryParse(lines[i]);
    if (message) return message;
  }

  return null;
}

export class ClaudeRunner {
  constructor(private options: ClaudeRunnerOptions) {}

  async run(signal?: AbortSignal): Promise<AgentOutput> {
    const args = this.buildArgs();
    const runner = this.options.runner ?? runCommand;
    const binary = this.options.binary ?? DELEGATED_AGENT_SETTINGS.binary;

    logger.info(
      {
        workDir: this.options.workDir,
        model: this.options.model,
        maxTurns: this.options.maxTurns,
        args: args.slice(0, -1), // Log args without the prompt for brevity
        promptLength: this.options.prompt.length,
      },
      'Starting Claude Code'
    );

    const command = await runner(binary, args, {
      cwd: this.options.workDir,
      timeout: this.options.timeout ?? DELEGATED_AGENT_SETTINGS.defaultTimeout,
      maxOutputChars: this.options.maxOutputSize ?? DELEGATED_AGENT_SETTINGS.maxOutputSize,
      signal,
    });

    const message = command.truncated ? null : parseResultMessage(command.stdout);
    const usage = message?.usage;
    const inputTokens = usage
      ? usage.input_tokens + usage.cache_creation_input_tokens + usage.cache_read_input_tokens
      : 0;
    const outputTokens = usage?.output_tokens ?? 0;
    const isError = message?.is_error ?? true;

    const output: AgentOutput = {
      success:
        command.exitCode === 0 && !command.timedOut && !command.truncated && !isError,
      result: message?.result ?? '',
      isError,
      exitCode: command.exitCode,
      inputTokens,
      outputTokens,
      totalCost: message?.total_cost_usd ?? null,
      truncated: command.truncated,
      timedOut: command.timedOut,
      stderr: command.stderr,
      duration: command.duration,
    };

    logger.info(
      {
        exitCode: output.exitCode,
        duration: output.duration,
        inputTokens,
        outputTokens,
        totalCost: output.totalCost,
        success: output.success,
      },
      'Claude Code completed'
    );

    return output;
  }

  buildArgs(): string[] {
    const args: string[] = [...DELEGATED_AGENT_SETTINGS.defaultFlags];

    if (this.options.model) {
      args.push('--model', this.options.model);
    }

    if (this.options.maxTurns) {
      args.push('--max-turns', this.options.maxTurns.toString());
    }

    if (this.options.systemPrompt) {
      args.push('--system-prompt', this.options.systemPrompt);
    }

    if (this.options.allowedTools?.length) {
      args.push('--allowedTools', this.options.allowedTools.join(','));
    }

    // Add the prompt as the final argument
    args.push(this.options.prompt);

    return args;
  }
}
