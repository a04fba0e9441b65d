/**
 * Album Seed Script
 *
 * Creates a small capture album for local runs of the relay.
 * Run with: npx tsx scripts/seed-album.ts [dir] [--days 3] [--per-day 2]
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';

const SOURCE_ID = '0123456789ABCDEF0123456789ABCDEF';

interface SeedConfig {
  root: string;
  days: number;
  perDay: number;
}

function readFlag(name: string, fallback: number): number {
  const index = process.argv.indexOf(name);
  const value = index >= 0 ? Number(process.argv[index + 1]) : NaN;
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

async function seed(config: SeedConfig): Promise<void> {
  console.log(`🌱 Seeding album at ${config.root}...\n`);

  const today = new Date();
  let created = 0;

  for (let offset = config.days - 1; offset >= 0; offset--) {
    const day = new Date(today.getFullYear(), today.getMonth(), today.getDate() - offset);
    const dir = join(
      config.root,
      String(day.getFullYear()),
      pad(day.getMonth() + 1),
      pad(day.getDate())
    );
    await mkdir(dir, { recursive: true });

    for (let i = 0; i < config.perDay; i++) {
      const stamp = `${day.getFullYear()}${pad(day.getMonth() + 1)}${pad(day.getDate())}` +
        `${pad(9 + i)}0000${pad(i)}`;
      const filename = `${stamp}-${SOURCE_ID}.jpg`;
      await writeFile(join(dir, filename), `placeholder capture ${created}\n`);
      console.log(`✓ ${join(dir, filename)}`);
      created++;
    }
  }

  console.log(`\n✅ Created ${created} item(s)`);
}

const firstArg = process.argv[2];

seed({
  root: resolve(firstArg && !firstArg.startsWith('--') ? firstArg : process.env['ALBUM_ROOT'] ?? './album'),
  days: readFlag('--days', 3),
  perDay: readFlag('--per-day', 2),
}).catch((error: unknown) => {
  console.error('❌ Seed failed:', error);
  process.exit(1);
});
