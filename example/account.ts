import { getTogglSecrets, readDebugFlag, TogglSession } from "../sdk";

/**
 * Prints the account behind an API token as JSON.
 *
 * Usage:
 *   npm run account -- API_TOKEN
 *
 * Without an argument, credentials come from TOGGL_API_TOKEN, or TOGGL_USERNAME and
 * TOGGL_PASSWORD. Set TOGGL_DEBUG=1 (or true, yes) to log requests to stderr.
 */
async function main() {
  const [token] = process.argv.slice(2);
  const session = token
    ? TogglSession.open(token, { debug: readDebugFlag() })
    : await TogglSession.fromSecrets(getTogglSecrets());

  const account = await session.getAccount();
  console.log(JSON.stringify(account, null, 2));
}

main().catch((err) => {
  console.error("error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
