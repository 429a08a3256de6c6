import { Command } from 'commander';
import { stringify } from 'yaml';
import type { AppConfig } from '../../config/env';
import { resolveConfig, runCommand } from '../context';

/**
 * Copy of the configuration that is safe to print.
 */
export function maskSecrets(appConfig: AppConfig): AppConfig {
  const key = appConfig.ai.apiKey;
  return {
    ...appConfig,
    ai: {
      ...appConfig.ai,
      apiKey: key ? `${key.slice(0, 3)}***` : undefined
    }
  };
}

const showCommand = new Command('show')
  .description('Print the effective configuration')
  .option('--json', 'Print JSON instead of YAML')
  .action(async (options: { json?: boolean }, command: Command) => {
    await runCommand(async () => {
      const masked = maskSecrets(await resolveConfig(command));
      console.log(options.json ? JSON.stringify(masked, null, 2) : stringify(masked));
    });
  });

export const configCommand = new Command('config')
  .description('Inspect configuration')
  .addCommand(showCommand);
