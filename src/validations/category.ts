import { z } from "zod";

export const ZCategoryCreate = z.object({
  name: z.string().trim().min(1).max(50),
  description: z.string().default(""),
  parentId: z.number().int().positive().nullable().default(null),
});

export const ZCategoryUpdate = z.object({
  name: z.string().trim().min(1).max(50).optional(),
  description: z.string().optional(),
  parentId: z.number().int().positive().nullable().optional(),
});

export const ZCategoryQuery = z.object({
  name: z.string().optional(),
});


export type CategoryCreateRequest = z.infer<typeof ZCategoryCreate>;
export type CategoryUpdateRequest = z.infer<typeof ZCategoryUpdate>;
