/**
 * Live execution logger for swaggerpub.
 *
 * All output goes to stderr so stdout stays clean for JSON contract output.
 * Emoji prefixes give instant visual context in CI logs.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function request(url: string): void {
  write(`📤 Sending request to: ${url}`);
}

export function response(statusLine: string, ok: boolean): void {
  const icon = ok ? '✅' : '❌';
  write(`${icon} OpenAPI sent with response: ${statusLine}`);
}
