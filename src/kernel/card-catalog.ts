import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';
import { asCardName } from './branded.js';
import type { CardName } from './branded.js';
import { catalogIntegrityError } from './runtime-error.js';
import { CATALOG_INTEGRITY_REASONS } from './runtime-reasons.js';
import { CardCatalogFileSchema, CardDefinitionSchema } from './schemas.js';
import type { CardDefinitionInput } from './schemas.js';
import type { CardCatalog, CardDefinition } from './types.js';

const DEFAULT_CATALOG_URL = new URL('../../data/cards.yaml', import.meta.url);

let defaultCatalog: CardCatalog | null = null;

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

interface SchemaIssue {
  readonly path: readonly PropertyKey[];
  readonly message: string;
}

export const formatIssues = (issues: readonly SchemaIssue[]): readonly string[] =>
  issues.map((issue) => `${issue.path.length > 0 ? issue.path.map(String).join('.') : '<root>'}: ${issue.message}`);

const toDefinition = (card: z.output<typeof CardDefinitionSchema>): CardDefinition => {
  const common = { name: asCardName(card.name), icon: card.icon, text: card.text, value: card.value };
  switch (card.category) {
    case 'center':
      return {
        ...common,
        category: 'center',
        effect: card.effect,
        ...(card.repeat === undefined ? {} : { repeat: card.repeat }),
      };
    case 'exit':
      return { ...common, category: 'exit', effect: card.effect };
    case 'trap':
      return { ...common, category: 'trap', trigger: card.trigger, effect: card.effect };
  }
};

const buildCatalog = (cards: readonly z.output<typeof CardDefinitionSchema>[], assetPath?: string): CardCatalog => {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const card of cards) {
    if (seen.has(card.name)) {
      duplicates.push(card.name);
    }
    seen.add(card.name);
  }
  if (duplicates.length > 0) {
    throw catalogIntegrityError(`card catalog has duplicate names: ${duplicates.join(', ')}`, {
      reason: CATALOG_INTEGRITY_REASONS.DUPLICATE_NAME,
      names: duplicates,
      ...(assetPath === undefined ? {} : { assetPath }),
    });
  }

  const definitions = deepFreeze(cards.map(toDefinition));
  const byName = new Map<CardName, CardDefinition>(definitions.map((card) => [card.name, card]));
  return Object.freeze({ cards: definitions, byName });
};

/** Validates a list of raw card definitions and builds an immutable catalog. */
export const createCardCatalog = (cards: readonly CardDefinitionInput[]): CardCatalog => {
  if (cards.length === 0) {
    throw catalogIntegrityError('card catalog is empty', { reason: CATALOG_INTEGRITY_REASONS.EMPTY_CATALOG });
  }

  const parsed = CardDefinitionSchema.array().safeParse(cards);
  if (!parsed.success) {
    throw catalogIntegrityError(
      'card catalog failed schema validation',
      { reason: CATALOG_INTEGRITY_REASONS.SCHEMA_INVALID, issues: formatIssues(parsed.error.issues) },
      parsed.error,
    );
  }
  return buildCatalog(parsed.data);
};

/** Validates a parsed catalog document (`version` plus `cards`). */
export const parseCardCatalog = (document: unknown, assetPath?: string): CardCatalog => {
  const parsed = CardCatalogFileSchema.safeParse(document);
  if (!parsed.success) {
    throw catalogIntegrityError(
      'card catalog failed schema validation',
      {
        reason: CATALOG_INTEGRITY_REASONS.SCHEMA_INVALID,
        issues: formatIssues(parsed.error.issues),
        ...(assetPath === undefined ? {} : { assetPath }),
      },
      parsed.error,
    );
  }
  return buildCatalog(parsed.data.cards, assetPath);
};

export const loadCardCatalogFromFile = (assetPath: string): CardCatalog => {
  let document: unknown;
  try {
    document = parseYaml(readFileSync(assetPath, 'utf8'));
  } catch (error) {
    throw catalogIntegrityError(
      `card catalog could not be read from ${assetPath}`,
      { reason: CATALOG_INTEGRITY_REASONS.SCHEMA_INVALID, assetPath },
      error,
    );
  }
  return parseCardCatalog(document, assetPath);
};

/** The bundled catalog, loaded once per process. */
export const defaultCardCatalog = (): CardCatalog => {
  if (defaultCatalog === null) {
    defaultCatalog = loadCardCatalogFromFile(fileURLToPath(DEFAULT_CATALOG_URL));
  }
  return defaultCatalog;
};

export const getCardDefinition = (catalog: CardCatalog, name: CardName): CardDefinition => {
  const definition = catalog.byName.get(name);
  if (definition === undefined) {
    throw catalogIntegrityError(`unknown card: ${name}`, {
      reason: CATALOG_INTEGRITY_REASONS.UNKNOWN_NAME,
      names: [name],
    });
  }
  return definition;
};
