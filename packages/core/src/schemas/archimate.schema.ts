import { z } from 'zod';

// Shapes produced by fast-xml-parser with '@_' attribute prefixes and namespace
// prefixes removed, so `xsi:type` arrives as `@_type`.

const NameSchema = z.union([
  z.string(),
  z
    .object({
      '#text': z.string().optional(),
    })
    .loose(),
]);

export type ArchimateName = z.infer<typeof NameSchema>;

export const ArchimateElementSchema = z
  .object({
    '@_identifier': z.string().optional(),
    '@_type': z.string().optional(),
    name: z.array(NameSchema).optional(),
  })
  .loose();

export type ArchimateElement = z.infer<typeof ArchimateElementSchema>;

export const ArchimateRelationshipSchema = z
  .object({
    '@_identifier': z.string().optional(),
    '@_source': z.string().optional(),
    '@_target': z.string().optional(),
    '@_type': z.string().optional(),
  })
  .loose();

export type ArchimateRelationship = z.infer<typeof ArchimateRelationshipSchema>;

// A section with no children and no attributes parses to its text, which is
// '' or indentation whitespace. Interleaved whitespace in populated sections
// arrives as a '#text' key and is ignored by the loose objects below.
const emptyAsObject = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? {} : value;

const ElementsSectionSchema = z.preprocess(
  emptyAsObject,
  z
    .object({
      element: z.array(ArchimateElementSchema).default([]),
    })
    .loose()
);

const RelationshipsSectionSchema = z.preprocess(
  emptyAsObject,
  z
    .object({
      relationship: z.array(ArchimateRelationshipSchema).default([]),
    })
    .loose()
);

const ArchimateModelSchema = z.preprocess(
  emptyAsObject,
  z
    .object({
      elements: ElementsSectionSchema.optional(),
      relationships: RelationshipsSectionSchema.optional(),
    })
    .loose()
);

export const ArchimateDocumentSchema = z
  .object({
    model: ArchimateModelSchema,
  })
  .loose();

export type ArchimateDocument = z.infer<typeof ArchimateDocumentSchema>;
