/**
 * Database Seed Script
 * 
 * Creates the initial admin account from ADMIN_* settings.
 * Run with: npm run db:seed
 */

import { closeDatabase, openDatabase, UserRepository } from '@contacts-hub/core';
import { config } from '../apps/api/src/config/index.js';
import { hashPassword } from '../apps/api/src/lib/password.js';

async function main() {
  console.log('🌱 Seeding database...\n');

  const handle = openDatabase(config.database.url);
  try {
    const users = new UserRepository(handle.db);

    const existing = await users.findByEmail(config.adminEmail);
    if (existing) {
      console.log(`✓ Account already exists: ${existing.email} (${existing.role})`);
    } else {
      const admin = await users.create({
        username: config.adminUsername,
        email: config.adminEmail,
        password: await hashPassword(config.adminPassword),
        role: 'admin',
      });
      console.log(`✓ Admin user created: ${admin.username} <${admin.email}> (${admin.id})`);
    }

    console.log(`✓ Admins in database: ${await users.countByRole('admin')}`);
    console.log('\n✅ Seed completed successfully!');
  } finally {
    closeDatabase(handle);
  }
}

main().catch((e) => {
  console.error('❌ Seed failed:', e);
  process.exit(1);
});
