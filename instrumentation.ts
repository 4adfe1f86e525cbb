/**
 * Builds the service graph when the Node.js server starts, so a bad
 * configuration or catalog stops the process before it takes traffic.
 */
export async function register() {
  if (process.env.NEXT_RUNTIME !== 'nodejs') return;

  const { closeQueryService, getQueryService } = await import('./src/server/service');
  const { errorMessage } = await import('./src/server/errors');

  try {
    getQueryService();
  } catch (error) {
    console.error('[startup]', errorMessage(error));
    process.exit(1);
  }

  process.once('SIGTERM', () => {
    closeQueryService().catch((error: unknown) => {
      console.error('[server] Failed to close the database pool:', errorMessage(error));
    });
  });
}
