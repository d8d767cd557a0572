import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ModelParseError } from '../errors.js';
import { formatIssues } from '../utils/validation.js';
import { ArchimateDocumentSchema } from '../schemas/archimate.schema.js';
import type { ArchimateDocument, ArchimateName } from '../schemas/archimate.schema.js';
import type { ModelElement, ModelRelationship } from './model-types.js';

const ARRAY_TAGS = new Set(['element', 'relationship', 'name']);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  // Names are kept exactly as written.
  trimValues: false,
  // Decodes numeric character references such as &#233; and &#x2019;.
  htmlEntities: true,
  isArray: (tagName, _jPath, _isLeafNode, isAttribute) => !isAttribute && ARRAY_TAGS.has(tagName),
});

const EMPTY_RELATIONSHIPS: readonly ModelRelationship[] = [];

function parseDocument(xmlContent: string): ArchimateDocument {
  const validation = XMLValidator.validate(xmlContent);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ModelParseError(msg, { line, column: col });
  }

  const result = ArchimateDocumentSchema.safeParse(parser.parse(xmlContent));
  if (!result.success) {
    throw new ModelParseError(`Unexpected document structure:\n${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

function firstName(names: ArchimateName[] | undefined): string {
  const first = names?.[0];
  if (first === undefined) return '';
  if (typeof first === 'string') return first;
  return first['#text'] ?? '';
}

/**
 * In-memory index over an ArchiMate exchange-format document.
 *
 * The document is parsed once, in the constructor. Elements are keyed by
 * identifier and relationships are grouped by target, both in document order.
 */
export class ModelIndex {
  private readonly elementsById = new Map<string, ModelElement>();
  private readonly relationshipsByTarget = new Map<string, ModelRelationship[]>();
  private indexedRelationships = 0;

  constructor(xmlContent: string) {
    const document = parseDocument(xmlContent);
    this.indexElements(document);
    this.indexRelationships(document);
  }

  private indexElements(document: ArchimateDocument): void {
    for (const record of document.model.elements?.element ?? []) {
      const id = record['@_identifier'];
      if (id === undefined) continue;
      // Later duplicates overwrite earlier ones but keep the first position.
      this.elementsById.set(id, {
        id,
        type: record['@_type'] ?? '',
        name: firstName(record.name),
      });
    }
  }

  private indexRelationships(document: ArchimateDocument): void {
    for (const record of document.model.relationships?.relationship ?? []) {
      const source = record['@_source'];
      const target = record['@_target'];
      if (source === undefined || target === undefined) continue;

      let incoming = this.relationshipsByTarget.get(target);
      if (!incoming) {
        incoming = [];
        this.relationshipsByTarget.set(target, incoming);
      }
      incoming.push({
        id: record['@_identifier'],
        source,
        target,
        type: record['@_type'] ?? '',
      });
      this.indexedRelationships++;
    }
  }

  getElement(id: string): ModelElement | undefined {
    return this.elementsById.get(id);
  }

  getIncomingRelationships(targetId: string): readonly ModelRelationship[] {
    return this.relationshipsByTarget.get(targetId) ?? EMPTY_RELATIONSHIPS;
  }

  /** Elements in document order. */
  elements(): IterableIterator<ModelElement> {
    return this.elementsById.values();
  }

  get elementCount(): number {
    return this.elementsById.size;
  }

  get relationshipCount(): number {
    return this.indexedRelationships;
  }
}
