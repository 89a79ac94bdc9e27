import { describe, it, expect, vi, afterEach } from 'vitest';

async function loadConfig() {
  vi.resetModules();
  const { config } = await import('../../../src/config');
  return config;
}

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads numeric length limits from the environment', async () => {
    vi.stubEnv('SNIPPET_MAX_LENGTH', '120');
    vi.stubEnv('SUMMARY_TITLE_MAX_LENGTH', '40');

    const config = await loadConfig();

    expect(config.snippetMaxLength).toBe(120);
    expect(config.summaryTitleMaxLength).toBe(40);
  });

  it('falls back to the defaults for values that are not positive integers', async () => {
    vi.stubEnv('SNIPPET_MAX_LENGTH', 'abc');
    vi.stubEnv('SUMMARY_TITLE_MAX_LENGTH', '0');

    const config = await loadConfig();

    expect(config.snippetMaxLength).toBe(500);
    expect(config.summaryTitleMaxLength).toBe(60);
  });

  it('uses the defaults when the variables are empty', async () => {
    vi.stubEnv('SNIPPET_MAX_LENGTH', '');
    vi.stubEnv('SUMMARY_TITLE_MAX_LENGTH', '');

    const config = await loadConfig();

    expect(config.snippetMaxLength).toBe(500);
    expect(config.summaryTitleMaxLength).toBe(60);
  });
});
