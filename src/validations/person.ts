import { z } from "zod";

const ZBirthDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Must be a YYYY-MM-DD date")
  .refine((value) => !Number.isNaN(Date.parse(value)), "Invalid date");

export const ZEmail = z
  .string()
  .trim()
  .max(50)
  .email({ message: "Invalid email format" });

export const ZPassword = z.string().min(8).max(128);

export const ZPersonRegister = z.object({
  fullName: z.string().trim().min(1).max(150),
  email: ZEmail,
  password: ZPassword,
  birthDate: ZBirthDate.nullable().default(null),
});

export const ZPersonUpdate = z.object({
  fullName: z.string().trim().min(1).max(150).optional(),
  email: ZEmail.optional(),
  birthDate: ZBirthDate.nullable().optional(),
});

export const ZPasswordBody = z.object({
  password: ZPassword,
});

export const ZPersonQuery = z.object({
  email: z.string().optional(),
  createdAfter: z.coerce.date().optional(),
});

export type PersonRegisterRequest = z.infer<typeof ZPersonRegister>;
export type PersonUpdateRequest = z.infer<typeof ZPersonUpdate>;
