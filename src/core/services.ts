import { GitHubHost } from '../hosts/github.js';
import { GeminiClient } from '../llm/gemini-client.js';
import { JiraClient } from '../trackers/jira-client.js';
import { AIService } from './ai-service.js';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { TaskProcessor } from './task-processor.js';
import { TemplateStore } from './template-store.js';

export interface Services {
  config: AppConfig;
  templates: TemplateStore;
  processor: TaskProcessor;
  tracker: JiraClient;
}

export interface ServiceOptions {
  cwd?: string;
  configPath?: string;
}

/** Load configuration and wire the Jira, GitHub and Gemini clients together. */
export async function createServices(options: ServiceOptions = {}): Promise<Services> {
  const cwd = options.cwd ?? process.cwd();
  const config = await loadConfig({ cwd, configPath: options.configPath });

  const tracker = JiraClient.fromConfig(config);
  const templates = new TemplateStore(cwd);
  const processor = new TaskProcessor({
    tracker,
    host: GitHubHost.fromConfig(config),
    ai: new AIService(GeminiClient.fromConfig(config), templates),
    templates,
    config,
  });

  return { config, templates, processor, tracker };
}
