import 'dotenv/config';
import { validateDatabaseConfig } from '../src/lib/config/database.js';
import { parseNonNegativeInt } from '../src/lib/config/env.js';
import { createPool, ensureSchema } from '../src/lib/db.js';
import { logger } from '../src/lib/logger.js';
import { CEO_TITLE, OrgChartService } from '../src/services/org-chart.service.js';
import { PgNodeStore } from '../src/store/pg-node-store.js';

const MANAGER_TITLES = ['VP', 'Director', 'Manager'];
const REPORT_TITLES = ['Specialist', 'Analyst', 'Associate', 'Engineer'];

const MIN_EMPLOYEES = 5;
const MAX_EMPLOYEES = 15;

function pick<T>(items: T[]): T {
  return items[Math.floor(Math.random() * items.length)];
}

/**
 * CEO → managers → individual contributors, three levels deep. Every write
 * goes through the service so the hierarchy checks run as they do for the API.
 */
async function seedOrganization(service: OrgChartService, index: number): Promise<number> {
  const org = await service.createOrganization({ name: `Seed Org ${index}` });
  const size = MIN_EMPLOYEES + Math.floor(Math.random() * (MAX_EMPLOYEES - MIN_EMPLOYEES + 1));

  const ceo = await service.createEmployee(org.id, { name: `Employee ${index}-1`, title: CEO_TITLE });
  const managers: string[] = [];

  for (let n = 2; n <= size; n++) {
    const isManager = managers.length === 0 || Math.random() < 0.25;
    const employee = await service.createEmployee(org.id, {
      name: `Employee ${index}-${n}`,
      title: isManager ? pick(MANAGER_TITLES) : pick(REPORT_TITLES),
      managerId: isManager ? ceo.id : pick(managers),
    });
    if (isManager) managers.push(employee.id);
  }

  return size;
}

async function main() {
  const orgCount = parseNonNegativeInt('SEED_ORGS', process.env.SEED_ORGS, 10);
  const config = validateDatabaseConfig();
  const pool = createPool(config);
  const store = new PgNodeStore(pool, config.txMaxRetries);
  const service = new OrgChartService(store, logger.child({ script: 'seed' }, { level: 'warn' }));

  try {
    await ensureSchema(pool);
    const started = Date.now();
    let employees = 0;

    for (let i = 1; i <= orgCount; i++) {
      employees += await seedOrganization(service, i);
    }

    logger.info(
      { organizations: orgCount, employees, durationMs: Date.now() - started },
      'Seeding complete',
    );
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  logger.fatal({ err }, 'Seeding failed');
  process.exit(1);
});
