import { readFileSync } from 'node:fs';
import { extname, isAbsolute, join } from 'node:path';
import { load as yamlLoad } from 'js-yaml';
import type { ZodType, ZodTypeDef } from 'zod';
import { ValidationError, errorMessage } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import {
  catalogFileSchema,
  translationFileSchema,
  type CatalogFile,
  type Category,
  type Size,
  type TranslationFile,
} from './catalog.schemas.js';

const logger = createChildLogger('catalog-service');

const FONT_FILE_EXTENSIONS = new Set(['.ttf', '.otf', '.ttc']);

export interface PosterVariant {
  category: string;
  id: string;
  text: string;
  font: string;
  canvas: Size;
  box: Size;
  pointSize: { min: number; max: number };
  background: string;
  textColor: string;
  outputPath: string;
}

export interface BuildVariantsOptions {
  outputDir: string;
  fontsDir: string;
  /** Restrict to these category names */
  only?: string[];
}

function parseWith<T>(schema: ZodType<T, ZodTypeDef, unknown>, raw: unknown, source: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ValidationError(`Invalid ${source}: ${issues.join('; ')}`, { source, issues });
  }
  return result.data;
}

function readText(path: string, what: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ValidationError(`Cannot read ${what} at ${path}: ${errorMessage(error)}`, {
      path,
    });
  }
}

export function parseCatalog(json: string, source = 'catalog'): CatalogFile {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ValidationError(`Invalid ${source}: ${errorMessage(error)}`, { source });
  }
  const catalog = parseWith(catalogFileSchema, raw, source);

  const seen = new Set<string>();
  for (const category of catalog.categories) {
    if (seen.has(category.name)) {
      throw new ValidationError(`Invalid ${source}: duplicate category "${category.name}"`, { source });
    }
    seen.add(category.name);

    // Item ids name the output files
    const ids = new Set<string>();
    for (const item of category.items) {
      if (ids.has(item.id)) {
        throw new ValidationError(
          `Invalid ${source}: duplicate item "${item.id}" in category "${category.name}"`,
          { source, category: category.name, id: item.id }
        );
      }
      ids.add(item.id);
    }
  }
  return catalog;
}

export function loadCatalog(path: string): CatalogFile {
  const catalog = parseCatalog(readText(path, 'catalog'), path);
  logger.debug({ path, categories: catalog.categories.length }, 'Loaded catalog');
  return catalog;
}

export function parseTranslations(yamlText: string, source = 'translation file'): TranslationFile {
  let raw: unknown;
  try {
    raw = yamlLoad(yamlText);
  } catch (error) {
    throw new ValidationError(`Invalid ${source}: ${errorMessage(error)}`, { source });
  }
  return parseWith(translationFileSchema, raw, source);
}

export function loadTranslations(path: string): TranslationFile {
  const translations = parseTranslations(readText(path, 'translation file'), path);
  logger.debug(
    { path, language: translations.language, keys: Object.keys(translations.translations).length },
    'Loaded translations'
  );
  return translations;
}

/**
 * Font values naming a font file are looked up in the fonts directory;
 * anything else is a font name the image tool resolves itself.
 */
export function resolveFont(font: string, fontsDir: string): string {
  if (!FONT_FILE_EXTENSIONS.has(extname(font).toLowerCase()) || isAbsolute(font)) {
    return font;
  }
  return join(fontsDir, font);
}

function selectCategories(categories: Category[], only?: string[]): Category[] {
  if (!only?.length) return categories;

  const known = new Set(categories.map((c) => c.name));
  const unknown = only.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ValidationError(`Unknown categories: ${unknown.join(', ')}`, {
      unknown,
      available: [...known],
    });
  }
  const wanted = new Set(only);
  return categories.filter((c) => wanted.has(c.name));
}

/**
 * Expand category tables into one poster variant per item
 */
export function buildVariants(
  catalog: CatalogFile,
  translations: TranslationFile,
  options: BuildVariantsOptions
): PosterVariant[] {
  const variants: PosterVariant[] = [];
  let missingTranslations = 0;

  for (const category of selectCategories(catalog.categories, options.only)) {
    const font = resolveFont(category.font, options.fontsDir);

    for (const item of category.items) {
      let text = item.text;
      if (item.translationKey) {
        const translated = translations.translations[item.translationKey];
        if (translated) {
          text = translated;
        } else {
          missingTranslations++;
          logger.warn(
            { category: category.name, item: item.id, translationKey: item.translationKey, language: translations.language },
            'Missing translation, using fallback text'
          );
        }
      }

      variants.push({
        category: category.name,
        id: item.id,
        text: category.uppercase ? text.toUpperCase() : text,
        font,
        canvas: category.canvas ?? catalog.canvas,
        box: category.box,
        pointSize: { min: category.pointSize.min, max: category.pointSize.max },
        background: item.background ?? category.background,
        textColor: item.textColor ?? category.textColor,
        outputPath: join(options.outputDir, translations.language, category.name, `${item.id}.jpg`),
      });
    }
  }

  logger.info({ variants: variants.length, missingTranslations }, 'Built poster variants');
  return variants;
}
