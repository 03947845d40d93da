/**
 * In-process stand-ins for the classifier, tool endpoints and clock.
 */

import { ToolCatalog } from '../../src/catalog/catalog';
import type { ToolDefinition } from '../../src/catalog/types';
import type {
  ClassificationResult,
  ClassifierGateway,
  SelectedTool,
} from '../../src/classifier/types';
import { Logger } from '../../src/monitoring/logger';
import { InMemorySessionStorage } from '../../src/session/storage';
import { SessionStore } from '../../src/session/store';
import type { ConversationTurn } from '../../src/session/types';
import { SleepFunction, ToolInvocationEngine } from '../../src/tools/invocation-engine';
import type { ToolCallRequest, ToolCallResponse, ToolEndpoint } from '../../src/tools/types';
import { WorkflowConfig, WorkflowEngine } from '../../src/workflow/engine';

export const TEST_TOOLS: ToolDefinition[] = [
  {
    name: 'IBTAgent',
    description: 'Answers questions about insurance benefits and coverage.',
    endpoint: 'http://tools.test/ibt',
    capabilities: ['benefits', 'coverage'],
    parameters: { required: ['userPrompt'], optional: ['planId'] },
    examples: [{ prompt: 'What are my dental benefits?', reasoning: 'Benefit question' }],
  },
  {
    name: 'ClaimsAgent',
    description: 'Looks up claim status and history.',
    endpoint: 'http://tools.test/claims',
    capabilities: ['claim status'],
    parameters: { required: ['userPrompt'], optional: ['claimId'] },
    examples: [],
  },
  {
    name: 'DocumentAgent',
    description: 'Retrieves policy documents.',
    endpoint: 'http://tools.test/documents',
    capabilities: ['policy documents'],
    parameters: { required: ['userPrompt'], optional: [] },
    examples: [],
  },
  {
    name: 'SupportAgent',
    description: 'Connects the member with customer support.',
    endpoint: 'http://tools.test/support',
    capabilities: ['contact support'],
    parameters: { required: ['userPrompt'], optional: [] },
    examples: [],
  },
];

export function createTestCatalog(): ToolCatalog {
  return new ToolCatalog(TEST_TOOLS);
}

export function candidate(
  toolName: string,
  confidence: number,
  extra: Partial<SelectedTool> = {}
): SelectedTool {
  return { toolName, confidence, reasoning: `picked ${toolName}`, parameters: {}, ...extra };
}

export function classification(
  confidence: number,
  candidates: SelectedTool[],
  directResponse?: string
): ClassificationResult {
  return directResponse === undefined
    ? { confidence, candidates }
    : { confidence, candidates, directResponse };
}

/**
 * Pending forever, as a hung downstream call would be
 */
export const HANG = Symbol('hang');

type ClassifierStep = ClassificationResult | Error | typeof HANG;

export class FakeClassifier implements ClassifierGateway {
  readonly calls: Array<{ query: string; history: ConversationTurn[]; signal?: AbortSignal }> = [];
  /** Runs before each classification, e.g. to disturb the session mid-turn */
  onCall?: (callNumber: number) => Promise<void>;
  private readonly steps: ClassifierStep[];

  constructor(...steps: ClassifierStep[]) {
    this.steps = steps;
  }

  enqueue(...steps: ClassifierStep[]): void {
    this.steps.push(...steps);
  }

  async classify(
    query: string,
    history: readonly ConversationTurn[],
    _catalog: ToolCatalog,
    signal?: AbortSignal
  ): Promise<ClassificationResult> {
    this.calls.push({ query, history: [...history], signal });
    if (this.onCall) {
      await this.onCall(this.calls.length);
    }
    const step = this.steps.shift();
    if (step === undefined) {
      throw new Error('FakeClassifier has no more results');
    }
    if (step === HANG) {
      return new Promise<ClassificationResult>(() => undefined);
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

type ToolHandler = (request: ToolCallRequest, callNumber: number) => ToolCallResponse | Error | typeof HANG;

export class FakeToolEndpoint implements ToolEndpoint {
  readonly calls: Array<{ toolName: string; request: ToolCallRequest }> = [];
  private readonly handlers = new Map<string, ToolHandler>();

  on(toolName: string, handler: ToolHandler): this {
    this.handlers.set(toolName, handler);
    return this;
  }

  callsTo(toolName: string): ToolCallRequest[] {
    return this.calls.filter((call) => call.toolName === toolName).map((call) => call.request);
  }

  async invoke(tool: ToolDefinition, request: ToolCallRequest): Promise<ToolCallResponse> {
    this.calls.push({ toolName: tool.name, request });
    const handler = this.handlers.get(tool.name);
    if (!handler) {
      return { ok: true, payload: { answer: `${tool.name} answer` } };
    }

    const outcome = handler(request, this.callsTo(tool.name).length);
    if (outcome === HANG) {
      return new Promise<ToolCallResponse>(() => undefined);
    }
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }
}

export class ManualClock {
  constructor(public current: number = Date.UTC(2024, 0, 1, 12, 0, 0)) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export class RecordingSleep {
  readonly delays: number[] = [];

  sleep: SleepFunction = async (ms) => {
    this.delays.push(ms);
  };
}

export function quietLogger(): Logger {
  return new Logger('ERROR');
}

export const DEFAULT_TEST_WORKFLOW_CONFIG: WorkflowConfig = {
  thresholds: { high: 7.0, low: 5.0 },
  maxClarificationRounds: 2,
  requestTimeoutMs: 5000,
};

export interface TestHarness {
  engine: WorkflowEngine;
  sessions: SessionStore;
  storage: InMemorySessionStorage;
  classifier: FakeClassifier;
  endpoint: FakeToolEndpoint;
  clock: ManualClock;
  sleeps: RecordingSleep;
  catalog: ToolCatalog;
}

export function createHarness(
  options: {
    config?: Partial<WorkflowConfig>;
    ttlMs?: number;
    maxHistory?: number;
    maxAttempts?: number;
  } = {}
): TestHarness {
  const logger = quietLogger();
  const clock = new ManualClock();
  const sleeps = new RecordingSleep();
  const catalog = createTestCatalog();
  const storage = new InMemorySessionStorage();
  const sessions = new SessionStore(
    { ttlMs: options.ttlMs ?? 30 * 60 * 1000, maxHistory: options.maxHistory ?? 20, clock: clock.now },
    storage,
    logger
  );
  const classifier = new FakeClassifier();
  const endpoint = new FakeToolEndpoint();
  const invoker = new ToolInvocationEngine(
    endpoint,
    { maxAttempts: options.maxAttempts ?? 3, backoff: { baseDelayMs: 250, maxDelayMs: 4000 } },
    logger,
    sleeps.sleep
  );
  const engine = new WorkflowEngine({
    catalog,
    sessions,
    classifier,
    invoker,
    config: { ...DEFAULT_TEST_WORKFLOW_CONFIG, ...options.config },
    logger,
    clock: clock.now,
  });

  return { engine, sessions, storage, classifier, endpoint, clock, sleeps, catalog };
}
