import {
  DefaultQueryGuard,
  ViewTools,
  createExecutor,
  roleplayProfileFor,
  type Logger,
  type QueryExecutor,
} from '@viewquery/core';
import { requireExecutor, type ServerConfig } from './config.js';

export interface Runtime {
  tools: ViewTools;
  executor: QueryExecutor;
  guard: DefaultQueryGuard;
}

/** Wire the guard, executor and view profile described by `config`. */
export function createRuntime(
  config: ServerConfig,
  logger: Logger,
  executor: QueryExecutor = createExecutor(requireExecutor(config)),
): Runtime {
  const guard = new DefaultQueryGuard(config.guard);
  const tools = new ViewTools({
    executor,
    guard,
    profile: roleplayProfileFor(config.viewName),
    logger,
    characterLimit: config.characterLimit,
  });
  return { tools, executor, guard };
}
