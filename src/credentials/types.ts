import { z } from "zod";

/** Secrets shorter than this drop their group at load time. */
export const MIN_SECRET_LENGTH = 12;

export const registryAuthSchema = z.object({
  username: z.string().min(1),
  password: z.string(),
});

export type RegistryAuth = z.infer<typeof registryAuthSchema>;

export const groupCredentialSchema = z.object({
  name: z.string().trim().min(1, "group name is empty"),
  secret: z
    .string()
    .trim()
    .min(MIN_SECRET_LENGTH, `secrets are required to be at least ${MIN_SECRET_LENGTH} chars long`),
  registryAuth: registryAuthSchema.optional(),
  purgeOldImage: z.boolean().default(false),
});

export type GroupCredential = Readonly<z.infer<typeof groupCredentialSchema>>;
