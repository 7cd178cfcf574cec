// server/src/scripts/migrate.ts
import { sequelize } from '../db.js';
import { syncModels } from '../models/index.js';

async function migrate() {
  try {
    await sequelize.authenticate();
    console.log('Connected to Postgres');

    await syncModels({ alter: true });
    console.log('Database migrated');
  } catch (err) {
    console.error('Migration failed', err);
    process.exitCode = 1;
  } finally {
    await sequelize.close();
  }
}

migrate();
