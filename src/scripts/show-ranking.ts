import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module.js';
import { RankingService } from '../ranking/ranking.service.js';

function parseArgs(): { json: boolean; limit?: number } {
  const kv = Object.fromEntries(
    process.argv.slice(2).map((a): [string, string] => {
      const i = a.indexOf('=');
      return i === -1 ? [a.replace(/^--/, ''), ''] : [a.slice(2, i), a.slice(i + 1)];
    }),
  );
  return { json: kv.json === 'true' || kv.json === '', limit: kv.limit ? Number(kv.limit) : undefined };
}

async function main() {
  const args = parseArgs();
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn'] });
  try {
    const ranking = await app.get(RankingService).computeRanking();
    const rows = args.limit ? ranking.slice(0, args.limit) : ranking;

    if (args.json) {
      console.log(JSON.stringify(rows, null, 2));
      return;
    }

    const show = (value: number | string | null) => (value === null ? '-' : String(value));
    console.log(`🏆 ${ranking.length} analysis projects ranked\n`);
    for (const row of rows) {
      console.log(
        `${String(row.rank).padStart(3)}. ${row.projectKey}  coverage=${show(row.coverage)}%  duplication=${show(
          row.duplication,
        )}%  newIssues=${show(row.newIssues)}  worstHotspot=${show(row.worstHotspot)}`,
      );
    }
  } finally {
    await app.close();
  }
}

main().catch((err: unknown) => {
  console.error('❌ Ranking failed:', err);
  process.exit(1);
});
