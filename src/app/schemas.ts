import { z } from 'zod';
import { MAX_PASSWORD_BYTES, fitsPasswordLimit } from '../database/credentials';

const PasswordSchema = z
  .string()
  .min(8)
  .refine(fitsPasswordLimit, { message: `Password must be at most ${MAX_PASSWORD_BYTES} bytes` });

export const RegisterSchema = z.object({
  firstName: z.string().trim().min(1).max(100),
  lastName: z.string().trim().min(1).max(100),
  email: z.email(),
  password: PasswordSchema,
});

export const LoginSchema = z.object({
  email: z.string().trim().min(1),
  password: z.string().min(1),
});

export const IdParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export type RegisterInput = z.infer<typeof RegisterSchema>;
export type LoginInput = z.infer<typeof LoginSchema>;
