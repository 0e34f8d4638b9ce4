/**
 * Chat Orchestrator - one chat request from user message to final answer
 *
 * Flow:
 *   1. Cache lookup (when enabled)
 *   2. Context trimming (when enabled), repeated for every turn's request
 *   3. Primary turn through the resilience layer, then parse
 *   4. At most one reformat turn when the reply is not a valid action block
 *   5. Run the requested gdb commands with output capture
 *   6. Follow-up turn with the captured output when the model asked for it
 *
 * Every step shares one AbortSignal: the caller's, bounded by the request deadline.
 */
import { errorForAbortedSignal } from '../providers/abort.js';
import { ProviderError } from '../providers/errors.js';
import type { ProviderClient, ProviderFactory } from '../providers/index.js';
import type { ResilienceExecutor } from '../resilience/retry.js';
import type { SessionLogHolder, SessionLogger } from '../services/session-log.js';
import type { Settings } from '../services/settings.js';
import type { ChatRequest, ChatResult, HistoryMessage, ParsedResponse, ProviderId } from '../types/chat.js';
import { cacheKey, type ResponseCache } from './cache.js';
import type { ContextManager } from './context-manager.js';
import type { MetricsCollector } from './metrics.js';
import { SYSTEM_PROMPT, buildReformatMessage, buildUserContent, commandOutputContext } from './prompt.js';
import { isStructured, parseResponse } from './response-parser.js';

export const DEBUGGER_NOT_RUNNING_NOTE = '\n\n(Note: GDB is not running, cannot execute commands)';

export type TurnKind = 'primary' | 'reformat' | 'follow_up';

export interface CommandExecutor {
  isRunning(): boolean;
  executeWithCapture(command: string, timeoutMs?: number, signal?: AbortSignal): Promise<string>;
}

export interface SettingsSource {
  get(): Readonly<Settings>;
}

export interface OrchestratorDeps {
  settings: SettingsSource;
  providers: ProviderFactory;
  resilience: ResilienceExecutor;
  executor: CommandExecutor;
  metrics: MetricsCollector;
  sessionLog: SessionLogHolder;
  cache?: ResponseCache;
  contextManager?: ContextManager;
}

export interface OrchestratorOptions {
  requestTimeoutMs: number;
  maxTokens: number;
  captureTimeoutMs: number;
  reformatEnabled: boolean;
}

interface TurnScope {
  client: ProviderClient;
  provider: ProviderId;
  model: string;
  signal: AbortSignal;
  log: SessionLogger | undefined;
}

interface CommandRun {
  executed: string[];
  combinedOutput: string;
}

export class ChatOrchestrator {
  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions
  ) {}

  async handle(request: ChatRequest, signal?: AbortSignal): Promise<ChatResult> {
    // One settings snapshot for the whole request
    const settings = this.deps.settings.get();
    const { provider, model } = settings;
    const { metrics, cache } = this.deps;
    const log = this.deps.sessionLog.current();

    log?.logUserChat(request);
    metrics.recordRequest(provider);

    const key = cache?.isEnabled() ? cacheKey(provider, model, request) : undefined;
    if (cache && key) {
      const cached = cache.get(key);
      if (cached) {
        metrics.recordCacheHit(provider);
        console.log(`[Chat] Cache hit for ${key}`);
        log?.logEvent('INFO', 'chat.cache_hit', 'Returning cached response', { 'cache.key': key });
        return cached;
      }
      metrics.recordCacheMiss(provider);
    }

    const working = this.fitContext(request, 'primary', log);

    const deadline = AbortSignal.timeout(this.options.requestTimeoutMs);
    const combinedSignal = signal ? AbortSignal.any([signal, deadline]) : deadline;

    let client: ProviderClient;
    try {
      client = this.deps.providers({ provider, apiKey: settings.apiKey });
    } catch (error) {
      metrics.recordError(provider);
      log?.logError(error, 'Creating provider client');
      throw error;
    }

    const scope: TurnScope = { client, provider, model, signal: combinedSignal, log };

    let parsed: ParsedResponse;
    try {
      parsed = await this.primaryTurn(scope, working);
    } catch (error) {
      metrics.recordError(provider);
      log?.logError(error, 'Primary LLM request failed');
      throw error;
    }

    let text = parsed.text;
    let run: CommandRun = { executed: [], combinedOutput: '' };

    if (parsed.commands.length > 0) {
      if (this.deps.executor.isRunning()) {
        run = await this.runCommands(scope, parsed.commands);
      } else {
        console.warn(`[Chat] Model requested ${parsed.commands.length} commands but GDB is not running`);
        log?.logEvent('WARN', 'gdb.not_running', 'Skipping commands, GDB is not running', {
          'gdb.commands': parsed.commands,
        });
        text += DEBUGGER_NOT_RUNNING_NOTE;
      }
    }

    if (parsed.waitForOutput && run.combinedOutput !== '') {
      text = await this.followUpTurn(scope, working, run.combinedOutput, text);
    }

    const result: ChatResult = {
      response: text,
      executedCommands: run.executed,
      combinedOutput: run.combinedOutput,
    };

    if (cache && key) {
      cache.set(key, result);
    }
    log?.logEvent('INFO', 'chat.response', 'Sending final response', {
      'chat.response': text,
      'chat.executed_commands': run.executed,
    });
    return result;
  }

  private async primaryTurn(scope: TurnScope, request: ChatRequest): Promise<ParsedResponse> {
    const raw = await this.runTurn(scope, request, 'primary');
    const parsed = parseResponse(raw);
    scope.log?.logLLMResponse('primary', raw, parsed.method);

    if (isStructured(parsed) || raw.trim() === '' || !this.options.reformatEnabled) {
      return parsed;
    }

    console.log('[Chat] Reply was not a valid action block, requesting reformat');
    let reformatRaw: string;
    try {
      const reformat = this.fitContext({ ...request, message: buildReformatMessage(raw) }, 'reformat', scope.log);
      reformatRaw = await this.runTurn(scope, reformat, 'reformat');
    } catch (error) {
      if (scope.signal.aborted) throw error;
      console.warn(`[Chat] Reformat turn failed, using raw reply: ${describe(error)}`);
      scope.log?.logError(error, 'Reformat LLM request failed');
      return parsed;
    }

    const reformatted = parseResponse(reformatRaw);
    scope.log?.logLLMResponse('reformat', reformatRaw, reformatted.method);
    return isStructured(reformatted) ? reformatted : parsed;
  }

  private async runCommands(scope: TurnScope, commands: string[]): Promise<CommandRun> {
    const executed: string[] = [];
    const outputs: string[] = [];

    for (const command of commands) {
      if (scope.signal.aborted) {
        throw errorForAbortedSignal(scope.provider, scope.signal);
      }

      scope.log?.logCommand(command, 'llm');
      try {
        const output = await this.deps.executor.executeWithCapture(command, this.options.captureTimeoutMs, scope.signal);
        executed.push(command);
        outputs.push(output);
        scope.log?.logDebuggerOutput(command, output);
      } catch (error) {
        console.warn(`[Chat] Command "${command}" failed: ${describe(error)}`);
        scope.log?.logError(error, `Executing GDB command: ${command}`);
      }
    }

    return { executed, combinedOutput: outputs.join('\n') };
  }

  /**
   * Returns the follow-up text, or `primaryText` when the follow-up fails.
   */
  private async followUpTurn(
    scope: TurnScope,
    request: ChatRequest,
    combinedOutput: string,
    primaryText: string
  ): Promise<string> {
    const followUp = this.fitContext({
      ...request,
      sentContext: [...request.sentContext, commandOutputContext(combinedOutput)],
    }, 'follow_up', scope.log);

    try {
      const raw = await this.runTurn(scope, followUp, 'follow_up');
      const parsed = parseResponse(raw);
      scope.log?.logLLMResponse('follow_up', raw, parsed.method);
      if (raw.trim() === '') {
        console.warn('[Chat] Follow-up reply was empty, keeping primary text');
        return primaryText;
      }
      return parsed.text;
    } catch (error) {
      this.deps.metrics.recordError(scope.provider);
      console.warn(`[Chat] Follow-up turn failed, keeping primary text: ${describe(error)}`);
      scope.log?.logError(error, 'Follow-up LLM request failed');
      return primaryText;
    }
  }

  /**
   * Apply the context budget to one turn's request.
   */
  private fitContext(request: ChatRequest, turn: TurnKind, log: SessionLogger | undefined): ChatRequest {
    const { contextManager } = this.deps;
    if (!contextManager?.isEnabled()) return request;

    const trimmed = contextManager.process(request);
    if (trimmed.trimmed) {
      log?.logEvent('INFO', 'chat.context_trimmed', 'Trimmed request to fit the context budget', {
        'llm.turn': turn,
        'context.original_tokens': trimmed.originalTokens,
        'context.final_tokens': trimmed.finalTokens,
        'context.steps': trimmed.steps,
      });
    }
    return trimmed.request;
  }

  private async runTurn(scope: TurnScope, request: ChatRequest, turn: TurnKind): Promise<string> {
    const { client, provider, model, signal, log } = scope;
    const userContent = buildUserContent(request.message, request.sentContext);
    const messages: HistoryMessage[] = [...request.history, { role: 'user', content: userContent }];

    log?.logLLMRequest(provider, model, turn, userContent);
    console.log(`[Chat] ${turn} turn -> ${provider}/${model} (${messages.length} messages)`);

    const startTime = Date.now();
    const reply = await this.deps.resilience.execute(
      provider,
      () => client.send({
        model,
        messages,
        systemPrompt: SYSTEM_PROMPT,
        maxTokens: this.options.maxTokens,
        jsonMode: true,
        signal,
      }),
      {
        signal,
        onRetry: () => this.deps.metrics.recordRetry(provider),
      }
    );
    this.deps.metrics.recordResponse(provider, Date.now() - startTime, reply.usage);
    return reply.text;
  }
}

function describe(error: unknown): string {
  if (error instanceof ProviderError) return `${error.kind}: ${error.message}`;
  return error instanceof Error ? error.message : String(error);
}
