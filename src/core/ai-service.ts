import { z } from 'zod';

import type { LLMClient } from '../llm/types.js';
import type { Task } from '../trackers/types.js';
import { logger } from '../ui/logger.js';
import type { CodebaseContext } from './codebase-context.js';
import type { TemplateStore } from './template-store.js';

const textOrLines = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value.join('\n') : value));

export const taskAnalysisSchema = z.object({
  files_to_modify: z
    .array(z.object({ path: z.string().min(1), changes: textOrLines.default('') }))
    .default([]),
  files_to_create: z
    .array(
      z.object({
        path: z.string().min(1),
        content: z.string().default(''),
        reason: z.string().default(''),
      }),
    )
    .default([]),
  explanation: textOrLines.default(''),
});

export type TaskAnalysis = z.infer<typeof taskAnalysisSchema>;

export const codeEditSchema = z.object({
  type: z.literal('update').default('update'),
  context: z.string().default(''),
  old_code: z.string().default(''),
  new_code: z.string(),
});

export type CodeEdit = z.infer<typeof codeEditSchema>;

export const codeChangePlanSchema = z.object({
  files_to_modify: z
    .array(z.object({ path: z.string().min(1), changes: z.array(codeEditSchema) }))
    .default([]),
  files_to_create: z
    .array(z.object({ path: z.string().min(1), content: z.string() }))
    .default([]),
  commit_message: z.string().optional(),
});

export type CodeChangePlan = z.infer<typeof codeChangePlanSchema>;

export interface PromptTarget {
  repository: string;
  baseBranch: string;
}

type ReadFile = (path: string) => Promise<string | null>;

function patternVars(context: CodebaseContext) {
  return {
    projectType: context.projectType.toUpperCase(),
    sourcePatterns: context.patterns.sourceFiles.join(', '),
    configPatterns: context.patterns.configFiles.join(', '),
    keyPatterns: context.patterns.keyFiles.join(', '),
  };
}

/**
 * Two-step drafting: an analysis of what to change, then the exact edits.
 */
export class AIService {
  constructor(
    private readonly llm: LLMClient,
    private readonly templates: TemplateStore,
  ) {}

  get modelName(): string {
    return `${this.llm.provider}/${this.llm.model}`;
  }

  async analyzeTask(task: Task, context: CodebaseContext, target: PromptTarget): Promise<TaskAnalysis> {
    const configFiles = Object.fromEntries(
      Object.entries(context.keyFiles).filter(([path]) => !(path in context.sourceFiles)),
    );

    const prompt = await this.templates.render('analyze-task', {
      ...patternVars(context),
      repository: target.repository,
      baseBranch: target.baseBranch,
      structure: context.structure || '(no matching source files)',
      sourceFiles: JSON.stringify(context.sourceFiles, null, 2),
      configFiles: Object.keys(configFiles).length > 0 ? JSON.stringify(configFiles, null, 2) : '',
      omittedNote:
        context.omitted > 0
          ? `${context.omitted} matching files were left out to keep the prompt within its size limit.`
          : '',
      key: task.key,
      summary: task.summary,
      description: task.description || '(none)',
      status: task.status,
      labels: task.labels.join(', '),
    });

    logger.debug(`Analysis prompt for ${task.key}: ${prompt.length} chars`);
    return this.llm.completeJson(prompt, taskAnalysisSchema);
  }

  async generateCodeChanges(
    task: Task,
    analysis: TaskAnalysis,
    context: CodebaseContext,
    readFile: ReadFile,
  ): Promise<CodeChangePlan> {
    const filesContent: Record<string, string> = {};
    for (const { path } of analysis.files_to_modify) {
      const known = context.sourceFiles[path] ?? context.keyFiles[path];
      const content = known ?? (await readFile(path));
      if (content === null) {
        logger.warn(`${path} does not exist in the repository; sending it as an empty file`);
      }
      filesContent[path] = content ?? '';
    }

    const prompt = await this.templates.render('generate-changes', {
      ...patternVars(context),
      structure: context.structure || '(no matching source files)',
      key: task.key,
      summary: task.summary,
      description: task.description || '(none)',
      status: task.status,
      labels: task.labels.join(', '),
      analysis: JSON.stringify(analysis, null, 2),
      filesToModify: JSON.stringify(filesContent, null, 2),
    });

    logger.debug(`Generation prompt for ${task.key}: ${prompt.length} chars`);
    return this.llm.completeJson(prompt, codeChangePlanSchema);
  }
}
