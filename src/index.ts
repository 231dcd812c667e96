export * from './types/shared.js';
export * from './errors.js';
export { loadConfig, type Config } from './config/index.js';
export { createLogger, type Logger } from './log.js';
export { createLLMAdapter } from './llm/factory.js';
export type { LLMAdapter, LLMConfig } from './llm/types.js';
export type { CodeGenerator, GenerationRequest } from './generator/types.js';
export { LlmCodeGenerator } from './generator/llm-generator.js';
export { Workspace } from './sandbox/workspace.js';
export { ImageCache, type ImageHandle } from './sandbox/image-cache.js';
export { imageDescriptor, type ImageDescriptor } from './sandbox/recipe.js';
export { DockerRuntime } from './sandbox/docker.js';
export { Sandbox, MOUNT_PATH, type SandboxOptions } from './sandbox/sandbox.js';
export type { ContainerRuntime, InstanceHandle, InstanceSpec } from './sandbox/types.js';
export { Orchestrator, type OrchestratorOptions, type ProgramRunner } from './orchestrator/orchestrator.js';
export { createTask, type TaskInput } from './orchestrator/task.js';
export { classifyResult, DEFAULT_STDERR_POLICY, type StderrPolicy } from './orchestrator/analyzer.js';
export { SessionStore } from './session/store.js';
