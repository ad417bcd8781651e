/**
 * Vitest setup: keep tests hermetic against endpoint overrides
 * inherited from the host shell.
 */

delete process.env["ANTHROPIC_BASE_URL"];
delete process.env["OPENAI_BASE_URL"];
