export * from "./config/Config.js";
export * from "./config/ConfigLoader.js";
export * from "./providers/ProviderTypes.js";
export * from "./providers/AnthropicProvider.js";
export * from "./providers/OpenAiCompatibleProvider.js";
export * from "./providers/ProviderRegistry.js";
export * from "./embeddings/HashingEmbedder.js";
export * from "./embeddings/HttpEmbedder.js";
export * from "./embeddings/createEmbedder.js";
export * from "./prompts/SystemPrompts.js";
export * from "./store/SearchResults.js";
export * from "./store/SemanticStore.js";
export * from "./tools/ToolTypes.js";
export * from "./tools/ToolManager.js";
export * from "./tools/search/ContentSearchTool.js";
export * from "./tools/outline/OutlineTool.js";
export * from "./runtime/RunLogger.js";
export * from "./runtime/RoundContext.js";
export * from "./runtime/RoundOrchestrator.js";
export * from "./ingestion/DocumentProcessor.js";
export * from "./session/SessionManager.js";
export * from "./RagSystem.js";
export * from "./api/ApiServer.js";
