/**
 * Check Command
 *
 * Validate settings, logo assets and encoder availability.
 */

import ora from 'ora';
import chalk from 'chalk';
import type { Command } from 'commander';
import { describeError, type LogoRole } from '@brandcast/core';
import { AssetResolver } from '@brandcast/media';
import { createContext, globalOptions, type CommandContext } from '../lib/context.js';
import { printFailure, printHeader, printJson, printSuccess, printError } from '../lib/output.js';

interface CheckResult {
  name: string;
  ok: boolean;
  detail: string;
}

export async function checkCommand(_options: unknown, command: Command): Promise<void> {
  const globals = globalOptions(command);
  const spinner = ora({ text: 'Checking configuration...', isSilent: globals.json === true }).start();

  let context: CommandContext;
  try {
    context = await createContext(globals);
  } catch (error) {
    spinner.fail('Settings are invalid');
    if (globals.json) printJson({ ok: false, error: describeError(error) });
    else printFailure(error);
    process.exit(1);
  }

  const { service, settings, settingsPath } = context;
  const results: CheckResult[] = [{ name: 'settings', ok: true, detail: settingsPath }];

  spinner.text = 'Checking encoder binaries...';
  const tools = await service.checkTools();
  results.push(
    { name: 'ffmpeg', ok: tools.ffmpeg.available, detail: tools.ffmpeg.path },
    { name: 'ffprobe', ok: tools.ffprobe.available, detail: tools.ffprobe.path }
  );

  spinner.text = 'Checking logo assets...';
  const resolver = new AssetResolver(service.ffprobe, context.logger);
  const roles: LogoRole[] = ['static', 'animated'];
  for (const role of roles) {
    const path = settings.logos[role].file;
    try {
      const asset = await resolver.resolveAsset(role, path);
      results.push({ name: `${role} logo`, ok: true, detail: `${path} (${asset.width}x${asset.height})` });
    } catch (error) {
      results.push({ name: `${role} logo`, ok: false, detail: describeError(error) });
    }
  }
  spinner.stop();

  const ok = results.every((result) => result.ok);
  if (context.json) {
    printJson({ ok, checks: results });
  } else {
    printHeader('Brandcast check');
    for (const result of results) {
      const icon = result.ok ? chalk.green('[OK]') : chalk.red('[ERR]');
      console.log(`  ${icon} ${result.name.padEnd(14)} ${chalk.gray(result.detail)}`);
    }
    console.log();
    if (ok) printSuccess('Ready to process videos');
    else printError('Some checks failed');
  }

  if (!ok) process.exitCode = 1;
}
