// Public API entry point
// Re-exports from all modules for external consumers

export type { Answer, Message, ModelClient, ModelRequest, ModelResponse, ParameterDef, Result, RoundRecord, Source, TokenUsage, ToolDefinition, ToolInvocationRequest, ToolResult } from "./types";
export { LecternError, DuplicateToolError, UnknownToolError, ToolExecutionError, ModelCommunicationError, DeadlineExceededError, ConfigError, describeError, type ControllerError, type ErrorCode } from "./errors";
export { ToolRegistry, defineTool, type ToolDescriptor, type ToolOutput, type ToolSpec } from "./tool-registry";
export { ToolDispatcher, type DispatchHooks } from "./tool-dispatcher";
export { createContext, createRoundRecord, deriveContext, buildMessages, buildSystemContent, type ConversationContext } from "./conversation-context";
export { aggregateSources } from "./source-aggregator";
export { RoundController, DEFAULT_MAX_ROUNDS, DEFAULT_MAX_OUTPUT_TOKENS, EMPTY_ANSWER_FALLBACK, type ControllerState, type RoundControllerConfig, type RoundObserver, type RunOptions, type RunOutcome } from "./round-controller";
export { AnthropicModelClient, DEFAULT_ANTHROPIC_MODEL, type AnthropicConfig, type AnthropicContent, type AnthropicReply, type MessagesClient } from "./providers/anthropic";
export { InMemoryCourseCatalog, catalogFileSchema, type CatalogFile, type CatalogSearchParams, type CatalogSearchResult, type CourseCatalog, type CourseInfo, type LessonInfo, type SearchHit } from "./tools/course-catalog";
export { createCourseSearchTool, COURSE_SEARCH_TOOL } from "./tools/course-search";
export { createCourseOutlineTool, formatOutline, COURSE_OUTLINE_TOOL } from "./tools/course-outline";
export { createCourseTools, type CourseToolsOptions } from "./tool-factory";
export { buildSystemPrompt } from "./prompt";
export { SessionStore, type Exchange, type HistoryProvider } from "./session-store";
export { QueryService, type AskOptions, type CourseStats, type QueryAnswer, type QueryServiceDeps } from "./query-service";
export { loadConfigFile, parseConfig, resolveConfig, resolveModel, type ConfigFile, type ConfigOverrides, type LecternConfig } from "./config";
export { createActivityReporter, type ActivityReporterConfig } from "./activity-reporter";
export { ExecutionMetrics } from "./execution-metrics";
