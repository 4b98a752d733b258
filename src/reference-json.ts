/**
 * JSON form of traced references, written by `blendpack trace --json` and
 * read back as a pre-traced list by `blendpack pack --pre-traced`.
 */
import { z } from 'zod';
import { BlendPath } from './blend-path.js';
import { PackError } from './types/errors.js';
import type { AssetReference, BlockUsage, FieldLocation } from './types/asset-reference.js';

export const REFERENCE_JSON_VERSION = 1;

const addressSchema = z
  .string()
  .regex(/^0x[0-9a-f]+$/i, 'expected a hexadecimal address')
  .transform((value) => BigInt(value));

const fieldLocationSchema = z.object({
  blockAddress: addressSchema,
  structName: z.string().min(1),
  elementIndex: z.number().int().min(0),
  field: z.array(z.string().min(1)).min(1),
});

/** Paths are kept as text, with the raw bytes alongside when they are not valid UTF-8. */
const storedPathSchema = z.object({
  storedPath: z.string(),
  storedPathBase64: z.string().optional(),
});

const usageSchema = storedPathSchema.extend({
  sceneFile: z.string().min(1),
  blockAddress: addressSchema,
  blockCode: z.string().min(1),
  blockName: z.string(),
  pathFull: fieldLocationSchema.optional(),
  pathDir: fieldLocationSchema.optional(),
  pathBase: fieldLocationSchema.optional(),
  isSequence: z.boolean(),
  isOptional: z.boolean(),
  via: z.array(z.string()).default([]),
});

const referenceSchema = storedPathSchema.extend({
  absolutePath: z.string().min(1),
  isSequence: z.boolean(),
  isOptional: z.boolean(),
  sequenceStem: z.string().optional(),
  usages: z.array(usageSchema),
});

const documentSchema = z.object({
  version: z.literal(REFERENCE_JSON_VERSION),
  references: z.array(referenceSchema),
});

type StoredPathJson = z.input<typeof storedPathSchema>;

function storedPathToJson(path: BlendPath): StoredPathJson {
  const text = path.toString();
  return Buffer.from(text, 'utf8').equals(path.bytes) ? { storedPath: text } : { storedPath: text, storedPathBase64: path.bytes.toString('base64') };
}

function storedPathFromJson({ storedPath, storedPathBase64 }: z.output<typeof storedPathSchema>): BlendPath {
  return storedPathBase64 === undefined ? new BlendPath(storedPath) : new BlendPath(Buffer.from(storedPathBase64, 'base64'));
}

function locationToJson(location: FieldLocation | undefined): z.input<typeof fieldLocationSchema> | undefined {
  if (!location) {
    return undefined;
  }
  return { ...location, blockAddress: `0x${location.blockAddress.toString(16)}`, field: [...location.field] };
}

/**
 * Serialises references to pretty-printed JSON.
 */
export function referencesToJson(references: readonly AssetReference[]): string {
  const document: z.input<typeof documentSchema> = {
    version: REFERENCE_JSON_VERSION,
    references: references.map((reference) => ({
      ...storedPathToJson(reference.storedPath),
      absolutePath: reference.absolutePath,
      isSequence: reference.isSequence,
      isOptional: reference.isOptional,
      sequenceStem: reference.sequenceStem,
      usages: reference.usages.map((usage) => ({
        ...storedPathToJson(usage.storedPath),
        sceneFile: usage.sceneFile,
        blockAddress: `0x${usage.blockAddress.toString(16)}`,
        blockCode: usage.blockCode,
        blockName: usage.blockName,
        pathFull: locationToJson(usage.pathFull),
        pathDir: locationToJson(usage.pathDir),
        pathBase: locationToJson(usage.pathBase),
        isSequence: usage.isSequence,
        isOptional: usage.isOptional,
        via: [...usage.via],
      })),
    })),
  };
  return `${JSON.stringify(document, null, 2)}\n`;
}

/**
 * Parses and validates a reference document.
 *
 * @throws {PackError} If the text is not JSON or does not match the schema
 */
export function referencesFromJson(text: string): AssetReference[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new PackError(`Pre-traced references are not valid JSON: ${error instanceof Error ? error.message : String(error)}`, error);
  }
  const parsed = documentSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new PackError(`Invalid pre-traced references: ${details}`, parsed.error);
  }
  return parsed.data.references.map((reference): AssetReference => ({
    storedPath: storedPathFromJson(reference),
    absolutePath: reference.absolutePath,
    isSequence: reference.isSequence,
    isOptional: reference.isOptional,
    sequenceStem: reference.sequenceStem,
    usages: reference.usages.map((usage): BlockUsage => ({
      sceneFile: usage.sceneFile,
      blockAddress: usage.blockAddress,
      blockCode: usage.blockCode,
      blockName: usage.blockName,
      storedPath: storedPathFromJson(usage),
      pathFull: usage.pathFull,
      pathDir: usage.pathDir,
      pathBase: usage.pathBase,
      isSequence: usage.isSequence,
      isOptional: usage.isOptional,
      via: usage.via,
    })),
  }));
}
