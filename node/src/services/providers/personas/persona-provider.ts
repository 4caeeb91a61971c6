// Persona lookup: user id → precomputed segment id
import fs from 'fs';
import { z } from 'zod';

const personaFileSchema = z.object({
  defaultPersona: z.string().min(1),
  users: z.record(z.string().min(1)).default({}),
});

export interface PersonaProvider {
  personaFor(userId: string | undefined): string;
}

export class JsonPersonaProvider implements PersonaProvider {
  constructor(
    private readonly users: Readonly<Record<string, string>>,
    private readonly defaultPersona: string,
  ) {}

  static fromFile(filePath: string): JsonPersonaProvider {
    const parsed = personaFileSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf8')));
    return new JsonPersonaProvider(parsed.users, parsed.defaultPersona);
  }

  personaFor(userId: string | undefined): string {
    if (userId === undefined) return this.defaultPersona;
    return this.users[userId] ?? this.defaultPersona;
  }
}
