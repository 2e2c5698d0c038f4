import { fileURLToPath } from 'node:url';
import { CourseGraphClient, loadGraphConfig, readCatalogFile, seedCatalog } from '../src';

const catalogPath = process.argv[2] ?? fileURLToPath(new URL('../data/catalog.json', import.meta.url));

async function main() {
  console.log('🌱 Starting seed...');

  const catalog = await readCatalogFile(catalogPath);
  const client = new CourseGraphClient(loadGraphConfig());

  try {
    const summary = await seedCatalog(client, catalog);
    console.log(
      `✅ Seeded ${summary.courses} courses, ${summary.requirements} requirements, ${summary.students} students`
    );
  } finally {
    await client.close();
  }
}

main().catch((error: unknown) => {
  console.error('❌ Seed failed:', error);
  process.exit(1);
});
