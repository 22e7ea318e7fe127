import 'dotenv/config';

import { eq } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/node-postgres';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { Pool } from 'pg';
import { z } from 'zod';

import { FieldCipherService } from '../src/common/crypto/field-cipher.service';
import { KeyDeriver } from '../src/common/crypto/key-deriver';
import {
  credentials,
  secureNotes,
  users,
} from '../src/common/database/schema';
import { createCredentialDtoSchema } from '../src/modules/credentials/dto/create-credential.dto';
import { createNoteDtoSchema } from '../src/modules/notes/dto/create-note.dto';
import { SEED_EMAIL } from './seed-user';

const DEMO_DATA_PATH = join(__dirname, 'data', 'demo-vault.json');

export const demoVaultSchema = z.object({
  credentials: z.array(createCredentialDtoSchema),
  notes: z.array(createNoteDtoSchema),
});

export type DemoVault = z.infer<typeof demoVaultSchema>;

export function loadDemoVault(path: string = DEMO_DATA_PATH): DemoVault {
  return demoVaultSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
}

async function main() {
  const databaseUrl = process.env.DATABASE_URL;

  if (!databaseUrl) {
    throw new Error('DATABASE_URL is required');
  }

  // Same derivation the API uses, so the API can read what is seeded here.
  const secret = process.env.APP_SECRET ?? '';
  const fieldCipher = new FieldCipherService(
    new KeyDeriver({ getApplicationSecret: () => secret }),
  );
  const vault = loadDemoVault();

  const pool = new Pool({ connectionString: databaseUrl, max: 1 });
  const db = drizzle(pool);

  try {
    const [user] = await db
      .select({ id: users.id })
      .from(users)
      .where(eq(users.email, SEED_EMAIL))
      .limit(1);

    if (!user) {
      throw new Error(`Seed user ${SEED_EMAIL} not found; run seed:user first`);
    }

    const now = new Date();

    await db.transaction(async (tx) => {
      await tx.delete(credentials).where(eq(credentials.userId, user.id));
      await tx.delete(secureNotes).where(eq(secureNotes.userId, user.id));

      await tx.insert(credentials).values(
        vault.credentials.map((item) => ({
          userId: user.id,
          label: item.label,
          type: item.type,
          websiteUrl: item.websiteUrl ?? null,
          username: item.username ?? null,
          email: item.email ?? null,
          passwordEncrypted: fieldCipher.encrypt(item.password) ?? null,
          secretKeyEncrypted: fieldCipher.encrypt(item.secretKey) ?? null,
          note: item.note ?? null,
          isFavorite: item.isFavorite,
          tags: item.tags ?? null,
          createdAt: now,
          updatedAt: now,
        })),
      );

      await tx.insert(secureNotes).values(
        vault.notes.map((item) => ({
          userId: user.id,
          title: item.title,
          contentEncrypted: fieldCipher.encrypt(item.content),
          type: item.type,
          isFavorite: item.isFavorite,
          tags: item.tags ?? null,
          createdAt: now,
          updatedAt: now,
        })),
      );
    });

    console.log(
      `Seeded ${vault.credentials.length} credentials and ${vault.notes.length} notes for ${SEED_EMAIL}`,
    );
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
