import { z } from 'zod';

// === Store rows ===
// SQLite has no boolean column type; enabled comes back as 0/1.
export const UserRowSchema = z.object({
  username: z.string(),
  email: z.string(),
  password: z.string(),
  enabled: z.union([z.boolean(), z.literal(0), z.literal(1)]).transform(v => v === true || v === 1),
});
export type UserRow = z.infer<typeof UserRowSchema>;

export const AuthorityRowSchema = z.object({
  username: z.string(),
  authority: z.string(),
});
export type AuthorityRow = z.infer<typeof AuthorityRowSchema>;

// === Principal lookup ===
export const UsernameParamsSchema = z.object({
  username: z.string().min(1),
});
export type UsernameParams = z.infer<typeof UsernameParamsSchema>;

export const EmailParamsSchema = z.object({
  email: z.string().email(),
});
export type EmailParams = z.infer<typeof EmailParamsSchema>;
