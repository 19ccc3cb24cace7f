/**
 * Next.js calls register() once when the server starts. Loading the data
 * source configuration here turns a missing variable into a failed boot
 * rather than a 500 on the first request.
 */
export async function register(): Promise<void> {
  if (process.env.NEXT_RUNTIME !== 'nodejs') return;

  const { loadDataSourceConfig } = await import('./lib/config');
  const { logger } = await import('./lib/logger');

  const config = loadDataSourceConfig(process.env);
  logger.info('Data source configured', { source: config.kind, table: config.table });
}
