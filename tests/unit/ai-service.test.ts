import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { AIService } from '../../src/core/ai-service.js';
import type { TaskAnalysis } from '../../src/core/ai-service.js';
import { getFilePatterns } from '../../src/core/codebase-context.js';
import type { CodebaseContext } from '../../src/core/codebase-context.js';
import { TemplateStore } from '../../src/core/template-store.js';
import { FakeLLM, makeTask } from './helpers/fakes.js';

function nodeContext(): CodebaseContext {
  return {
    projectType: 'nodejs',
    patterns: getFilePatterns('nodejs'),
    structure: '    src/app.ts',
    keyFiles: { 'package.json': '{"name":"api"}' },
    sourceFiles: { 'src/app.ts': 'const app = express();\n' },
    omitted: 3,
  };
}

describe('AIService', () => {
  let tempDir: string;
  let templates: TemplateStore;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'taskbridge-test-'));
    templates = new TemplateStore(tempDir);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('names the model with its provider', () => {
    expect(new AIService(new FakeLLM(), templates).modelName).toBe('fake/test-model');
  });

  describe('analyzeTask', () => {
    it('sends the task and codebase and normalises the analysis', async () => {
      const llm = new FakeLLM([
        {
          files_to_modify: [{ path: 'src/app.ts', changes: ['Import the route', 'Mount it'] }],
          files_to_create: [{ path: 'src/health.ts', content: 'export {};\n' }],
          explanation: 'Adds a health route.',
        },
      ]);
      const service = new AIService(llm, templates);

      const analysis = await service.analyzeTask(makeTask(), nodeContext(), {
        repository: 'acme/api',
        baseBranch: 'main',
      });

      expect(analysis).toEqual({
        files_to_modify: [{ path: 'src/app.ts', changes: 'Import the route\nMount it' }],
        files_to_create: [{ path: 'src/health.ts', content: 'export {};\n', reason: '' }],
        explanation: 'Adds a health route.',
      });

      const [prompt] = llm.prompts;
      expect(prompt).toContain('Project Type: NODEJS\nRepository: acme/api (branch main)\n');
      expect(prompt).toContain('Project Structure:\n    src/app.ts\n');
      expect(prompt).toContain('"src/app.ts": "const app = express();\\n"');
      expect(prompt).toContain('Configuration Files:\n{\n  "package.json": "{\\"name\\":\\"api\\"}"\n}\n');
      expect(prompt).toContain('Note: 3 matching files were left out');
      expect(prompt).toContain('Task Key: DEMO-1\nSummary: Add a health endpoint\n');
      expect(prompt).toContain('Labels: ai-task, repo:acme/api\n');
      expect(prompt).toContain('- Key files: src/index.ts, src/index.js, index.js, src/app.ts, src/server.ts\n');
    });

    it('fills in empty lists when the model omits them', async () => {
      const service = new AIService(new FakeLLM([{ explanation: ['Nothing', 'to do'] }]), templates);

      await expect(
        service.analyzeTask(makeTask(), nodeContext(), { repository: 'acme/api', baseBranch: 'main' }),
      ).resolves.toEqual({ files_to_modify: [], files_to_create: [], explanation: 'Nothing\nto do' });
    });
  });

  describe('generateCodeChanges', () => {
    const analysis: TaskAnalysis = {
      files_to_modify: [
        { path: 'src/app.ts', changes: 'Mount the route' },
        { path: 'src/routes.ts', changes: 'Export it' },
        { path: 'docs/missing.md', changes: 'Document it' },
      ],
      files_to_create: [],
      explanation: '',
    };

    it('sends current file contents and applies plan defaults', async () => {
      const llm = new FakeLLM([
        {
          files_to_modify: [{ path: 'src/app.ts', changes: [{ old_code: 'express()', new_code: 'express().use(json())' }] }],
          commit_message: 'Mount the health route',
        },
      ]);
      const readFile = vi.fn(async (path: string) => (path === 'src/routes.ts' ? 'export {};\n' : null));
      const service = new AIService(llm, templates);

      const plan = await service.generateCodeChanges(makeTask(), analysis, nodeContext(), readFile);

      expect(plan).toEqual({
        files_to_modify: [
          {
            path: 'src/app.ts',
            changes: [{ type: 'update', context: '', old_code: 'express()', new_code: 'express().use(json())' }],
          },
        ],
        files_to_create: [],
        commit_message: 'Mount the health route',
      });

      // src/app.ts comes from the context; only the others are fetched.
      expect(readFile.mock.calls.map(([path]) => path)).toEqual(['src/routes.ts', 'docs/missing.md']);

      const [prompt] = llm.prompts;
      expect(prompt).toContain('Task: DEMO-1 - Add a health endpoint\n');
      expect(prompt).toContain(
        'Files to modify (current content):\n' +
          JSON.stringify(
            {
              'src/app.ts': 'const app = express();\n',
              'src/routes.ts': 'export {};\n',
              'docs/missing.md': '',
            },
            null,
            2,
          ),
      );
    });

    it('gives the generation prompt the task fields and the project structure', async () => {
      const llm = new FakeLLM([{ files_to_modify: [] }]);
      const service = new AIService(llm, templates);
      const task = makeTask({ description: 'Return 200 with body ok.', labels: ['ai-task', 'backend'] });

      await service.generateCodeChanges(task, analysis, nodeContext(), async () => null);

      const [prompt] = llm.prompts;
      expect(prompt).toContain(
        'Task: DEMO-1 - Add a health endpoint\n' +
          'Description: Return 200 with body ok.\n' +
          'Status: To Do\n' +
          'Labels: ai-task, backend\n',
      );
      expect(prompt).toContain('Project Structure:\n    src/app.ts\n');
    });

    it('rejects a plan that does not match the schema', async () => {
      const service = new AIService(new FakeLLM([{ files_to_modify: [{ path: 'src/app.ts' }] }]), templates);

      await expect(
        service.generateCodeChanges(makeTask(), analysis, nodeContext(), async () => null),
      ).rejects.toThrow();
    });
  });
});
