import { withEngine } from './engine.js';
import { printJson, projectLines } from './format.js';

export interface AnalyzeOptions {
  json?: boolean;
}

/** One-off analysis of a local directory; nothing is registered or stored. */
export async function analyze(directory: string, options: AnalyzeOptions = {}): Promise<void> {
  await withEngine('analyze', async (engine) => {
    const projects = await engine.analyzePath(directory);
    if (options.json) {
      printJson(projects);
      return;
    }
    projects.forEach((project, index) => {
      if (index > 0) console.log();
      for (const line of projectLines(project)) console.log(line);
    });
  });
}
