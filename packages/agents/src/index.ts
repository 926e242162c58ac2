/**
 * @waypost/agents - Local command and Claude Code sub-agent runners
 */

export {
  runCommand,
  CommandError,
  type CommandRunner,
  type CommandOptions,
  type CommandResult,
} from './command-runner.js';
export {
  ClaudeRunner,
  parseResultMessage,
  type ClaudeRunnerOptions,
  type AgentOutput,
  type ResultMessage,
} from './claude-runner.js';
