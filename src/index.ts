export { Tutor } from "./tutor.js";
export type {
  InboundMessage,
  ReceiveResult,
  RejectionReason,
  TutorCollaborators,
  TutorOptions,
} from "./tutor.js";
export { parseConfig, loadConfigFile } from "./config.js";
export { initLogger, log } from "./logger.js";
export type { LoggerSink } from "./logger.js";
export { ValidationError, StorageError, UpstreamError, SchedulingError, QueueClosedError } from "./errors.js";
export type {
  ChatAction,
  GeneratedReply,
  GenerationRequest,
  GrammarChecker,
  ReplyChannel,
  ResponseGenerator,
  SpeechSynthesizer,
  Transcriber,
} from "./collaborators.js";
export { ConversationStore } from "./storage/conversation-store.js";
export { StorageRouter, isValidConversationKey } from "./storage/router.js";
export { ContextAssembler, summarizeConversation } from "./context.js";
export { PerChatTaskQueue } from "./queue/task-queue.js";
export type { EnqueueRequest, JobOutcome, JobRunner, ShutdownResult } from "./queue/task-queue.js";
export { QueueSupervisor } from "./queue/supervisor.js";
export type { SupervisorStatus } from "./queue/supervisor.js";
export { Semaphore } from "./queue/semaphore.js";
export { ProviderChain, createProviderChain } from "./llm/provider-chain.js";
export type { ChatProvider } from "./llm/provider-chain.js";
export { localReply } from "./llm/local-reply.js";
export { RateLimiter } from "./middleware/rate-limiter.js";
export { InputValidator } from "./middleware/validator.js";
export { MetricsService } from "./metrics.js";
export { sweepRetention } from "./retention.js";
export { buildExportBundle, exportJsonBundle } from "./transfer/export-json.js";
export { importExportBundle, importJsonFile, parseExportBundle } from "./transfer/import-json.js";
export * from "./types.js";
