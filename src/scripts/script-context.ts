import type { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from '@/app.module';
import { LegacyViewService } from '@/modules/legacy/application/services/legacy-view.service';
import { type PrepareOptions, prepareStore } from '@/scripts/prepare-store';

export const RULE = '═══════════════════════════════════════════════';

export function hasFlag(args: readonly string[], name: string): boolean {
  return args.includes(name);
}

/** `--name value` or `--name=value`. */
export function optionValue(args: readonly string[], name: string): string | undefined {
  for (let i = 0; i < args.length; i++) {
    if (args[i] === name) return args[i + 1];
    if (args[i].startsWith(`${name}=`)) return args[i].slice(name.length + 1);
  }
  return undefined;
}

export function intOption(args: readonly string[], name: string, fallback: number, min = 1): number {
  const raw = optionValue(args, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

/** Boots the application context, runs the task and always closes the context. */
export async function withScoutContext<T>(
  logger: Logger,
  task: (ctx: INestApplicationContext) => Promise<T>,
  options: PrepareOptions = {},
): Promise<T> {
  const ctx = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });

  try {
    await prepareStore(ctx.get(LegacyViewService), logger, options);
    return await task(ctx);
  } finally {
    await ctx.close();
  }
}

export function runScript(logger: Logger, main: () => Promise<void>): void {
  main().catch((error: unknown) => {
    logger.error(`❌ ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`);
    process.exit(1);
  });
}
