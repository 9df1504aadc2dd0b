import { printBanner } from '../../src/ui/banner.js';

describe('printBanner', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.mocked(console.log).mockRestore();
  });

  it('shows the Jira account with the token length only', () => {
    printBanner({
      jiraUrl: 'https://example.atlassian.net',
      email: 'bot@example.com',
      apiToken: 'test-secret',
      project: 'DEMO',
      markerLabel: 'ai-task',
      dryRun: false,
    });

    const lines = vi.mocked(console.log).mock.calls.map((args) => args.join(' '));
    expect(lines).toContainEqual(expect.stringContaining('bot@example.com, API token <redacted, 11 chars>'));
    expect(lines.some((line) => line.includes('test-secret'))).toBe(false);
  });
});
