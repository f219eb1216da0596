import { z } from 'zod';
import { LANGUAGE_CODE_PATTERN } from '../../config/env.schema.js';

const dimension = z.number().int().positive();

export const sizeSchema = z.object({
  width: dimension,
  height: dimension,
});

export type Size = z.infer<typeof sizeSchema>;

const color = z.string().min(1, 'Color is required');

export const pointSizeRangeSchema = z
  .object({
    min: dimension,
    max: dimension,
  })
  .refine((range) => range.min <= range.max, { message: 'pointSize.min must not exceed pointSize.max' });

export const categoryItemSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'Item id must be usable as a file name'),
  text: z.string().min(1, 'Item text is required'),
  translationKey: z.string().optional(),
  background: color.optional(),
  textColor: color.optional(),
});

export type CategoryItem = z.infer<typeof categoryItemSchema>;

export const categorySchema = z.object({
  name: z.string().regex(/^[a-z0-9_-]+$/, 'Category name must be lowercase letters, digits, "_" or "-"'),
  font: z.string().min(1, 'Font is required'),
  uppercase: z.boolean().default(false),
  canvas: sizeSchema.optional(),
  box: sizeSchema,
  pointSize: pointSizeRangeSchema,
  background: color,
  textColor: color,
  items: z.array(categoryItemSchema).min(1, 'Category needs at least one item'),
});

export type Category = z.infer<typeof categorySchema>;

export const catalogFileSchema = z.object({
  canvas: sizeSchema,
  categories: z.array(categorySchema),
});

export type CatalogFile = z.infer<typeof catalogFileSchema>;

export const translationFileSchema = z.object({
  language: z.string().regex(LANGUAGE_CODE_PATTERN, 'language must be a language code such as "en" or "pt-BR"'),
  translations: z.record(z.string()).default({}),
});

export type TranslationFile = z.infer<typeof translationFileSchema>;
