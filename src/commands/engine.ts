import { RepositoryEngine } from '../lib/engine.js';
import { errorMessage, isReposcopeError } from '../lib/errors.js';
import { logError } from '../lib/fault-logger.js';

type EngineFactory = () => RepositoryEngine;

const defaultFactory: EngineFactory = () => new RepositoryEngine();
let engineFactory: EngineFactory = defaultFactory;

/** Replace how commands build their engine (tests pass an in-memory one). */
export function setEngineFactory(factory: EngineFactory | null): void {
  engineFactory = factory ?? defaultFactory;
}

export function createEngine(): RepositoryEngine {
  return engineFactory();
}

/**
 * Run a command body against a fresh engine, closing it afterwards.
 * Syncs left open by exited processes are failed first, so status output
 * never shows a lock nobody holds. Errors are logged, printed and turned
 * into exit code 1.
 */
export async function withEngine(command: string, run: (engine: RepositoryEngine) => Promise<void> | void): Promise<void> {
  let engine: RepositoryEngine | null = null;
  try {
    engine = createEngine();
    engine.registry.recoverInterruptedSyncs();
    await run(engine);
  } catch (error) {
    reportError(command, error);
  } finally {
    if (engine) await engine.close();
  }
}

export function reportError(command: string, error: unknown): void {
  logError('cli', `${command} failed: ${errorMessage(error)}`, error);
  const code = isReposcopeError(error) ? ` [${error.code}]` : '';
  console.error(`Error${code}: ${errorMessage(error)}`);
  process.exitCode = 1;
}
