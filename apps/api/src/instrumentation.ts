/**
 * Server startup hook: open the Neo4j driver once and close it on shutdown.
 */
export async function register(): Promise<void> {
  if (process.env.NEXT_RUNTIME !== 'nodejs') return;

  const { closeGraphClient, getGraphClient } = await import('@/lib/planner');
  await getGraphClient().connect();

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`🛑 ${signal} received, closing Neo4j driver`);
    closeGraphClient().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('❌ Failed to close Neo4j driver:', error);
        process.exit(1);
      }
    );
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}
