import 'dotenv/config';

import { eq } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';

import { userLogins, users } from '../src/common/database/schema';
import { hashPassword } from '../src/modules/auth/utils/password.util';

export const SEED_EMAIL = 'demo@example.com';
const SEED_PASSWORD = 'demo-password';

async function main() {
  const databaseUrl = process.env.DATABASE_URL;

  if (!databaseUrl) {
    throw new Error('DATABASE_URL is required');
  }

  const pool = new Pool({ connectionString: databaseUrl, max: 1 });
  const db = drizzle(pool);

  try {
    const passwordHash = await hashPassword(SEED_PASSWORD);
    const now = new Date();

    const user = await db.transaction(async (tx) => {
      const [existing] = await tx
        .select()
        .from(users)
        .where(eq(users.email, SEED_EMAIL))
        .limit(1);

      const userRow =
        existing ??
        (
          await tx
            .insert(users)
            .values({
              email: SEED_EMAIL,
              displayName: 'Demo User',
              createdAt: now,
              updatedAt: now,
            })
            .returning()
        )[0];

      await tx
        .insert(userLogins)
        .values({
          userId: userRow.id,
          passwordHash,
          createdAt: now,
          updatedAt: now,
          passwordUpdatedAt: now,
        })
        .onConflictDoUpdate({
          target: userLogins.userId,
          set: { passwordHash, updatedAt: now, passwordUpdatedAt: now },
        });

      await tx
        .update(users)
        .set({ isActive: true, updatedAt: now })
        .where(eq(users.id, userRow.id));

      return userRow;
    });

    console.log('Seeded user successfully');
    console.log(`email: ${SEED_EMAIL}`);
    console.log(`password: ${SEED_PASSWORD}`);
    console.log(`userId: ${user.id}`);
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Seed failed:', error);
    process.exitCode = 1;
  });
}
