#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv';
import { FileCredentialStore } from './auth/credential-store.js';
import { authenticatorOptions, createMsalClient, MicrosoftAuthenticator } from './auth/microsoft.js';
import { MicrosoftTodoClient } from './clients/microsoft-todo.js';
import { loadConfig } from './config.js';
import { ConfigError } from './core/errors.js';
import { TaskExporter } from './export/exporter.js';
import { createLogger } from './utils/logger.js';

async function main(): Promise<number> {
  loadDotenv();

  const config = loadConfig();
  const logger = createLogger(config);

  if (!config.microsoft.client_id) {
    throw new ConfigError(
      'Microsoft client_id not configured. ' +
      'Create an Azure App Registration and set microsoft.client_id in config.yaml or MS_CLIENT_ID.'
    );
  }

  const store = new FileCredentialStore(config.microsoft.token_cache_path, logger);
  const authenticator = new MicrosoftAuthenticator(
    createMsalClient(config.microsoft, logger),
    store,
    authenticatorOptions(config.microsoft),
    logger
  );

  const auth = await authenticator.authenticate();
  if (!auth.ok) {
    logger.error(
      { stage: auth.error.stage, error: auth.error.code, description: auth.error.description },
      'Microsoft authentication failed'
    );
    return 1;
  }

  const client = new MicrosoftTodoClient(
    {
      baseUrl: config.graph.base_url,
      accessToken: auth.accessToken,
      failOnError: config.graph.fail_on_error,
    },
    logger
  );

  const exporter = new TaskExporter(
    client,
    {
      format: config.export.format,
      saveAttachments: config.export.save_attachments,
      outputDir: config.export.output_dir,
    },
    logger
  );

  const summary = await exporter.exportAll();
  logger.info(
    {
      exported: summary.exported.length,
      skipped: summary.skipped.length,
      attachments: summary.savedAttachments.length,
    },
    'Export complete'
  );

  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error('Fatal error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
