import fs from 'fs';
import { createHash } from 'crypto';
import type { ZodError } from 'zod';

import { LoadError } from '../errors.js';
import { FactStore } from './factStore.js';
import {
  CONTRAINDICATION_SEVERITIES,
  FactDocumentSchema,
  INTERACTION_SEVERITIES,
  SEVERITY_TIERS,
  factId,
  isRelation,
  type ContraindicationSeverity,
  type Entity,
  type EntityKind,
  type Fact,
  type FactDocument,
  type FactRecord,
  type InteractionSeverity,
  type Relation,
  type SeverityTier,
} from './facts.js';

export type FactSource =
  | { kind: 'file'; path: string }
  | { kind: 'document'; document: unknown; origin?: string };

type Signature = { subject: readonly EntityKind[]; object: readonly EntityKind[] | 'tier' | 'hours' };

const SIGNATURES: Record<Relation, Signature> = {
  'has-symptom': { subject: ['condition'], object: ['symptom'] },
  'red-flag-symptom': { subject: ['condition'], object: ['symptom'] },
  'has-treatment': { subject: ['condition'], object: ['treatment'] },
  'has-urgency': { subject: ['condition'], object: 'tier' },
  'differential-from': { subject: ['condition'], object: ['condition'] },
  'time-sensitive': { subject: ['condition'], object: 'hours' },
  contraindication: { subject: ['treatment'], object: ['trigger'] },
  'drug-interaction': { subject: ['treatment', 'medication'], object: ['treatment', 'medication'] },
  'requires-dose-adjustment': { subject: ['treatment'], object: ['trigger'] },
  'requires-lab-test': { subject: ['condition'], object: ['lab-test'] },
  'requires-imaging': { subject: ['condition'], object: ['imaging'] },
  'evidence-source': { subject: ['condition', 'treatment'], object: ['evidence'] },
  'refers-to-specialist': { subject: ['condition'], object: ['specialist'] },
};

function formatZodError(err: ZodError): string {
  return err.issues
    .slice(0, 5)
    .map(i => `${i.path.join('.') || '<root>'}: ${i.message}`)
    .join('; ');
}

const reason = (err: unknown) => (err instanceof Error ? err.message : String(err));

function readSource(source: FactSource): { raw: unknown; origin: string } {
  if (source.kind === 'document') return { raw: source.document, origin: source.origin ?? 'inline' };
  let text: string;
  try {
    text = fs.readFileSync(source.path, 'utf8');
  } catch (err) {
    throw new LoadError(`Cannot read fact source: ${reason(err)}`, { path: source.path });
  }
  try {
    return { raw: JSON.parse(text), origin: source.path };
  } catch (err) {
    throw new LoadError(`Fact source is not valid JSON: ${reason(err)}`, { path: source.path });
  }
}

function isTier(value: unknown): value is SeverityTier {
  return typeof value === 'string' && (SEVERITY_TIERS as readonly string[]).includes(value);
}

function isContraSeverity(value: unknown): value is ContraindicationSeverity {
  return typeof value === 'string' && (CONTRAINDICATION_SEVERITIES as readonly string[]).includes(value);
}

function isInteractionSeverity(value: unknown): value is InteractionSeverity {
  return typeof value === 'string' && (INTERACTION_SEVERITIES as readonly string[]).includes(value);
}

/** Turns one record into a typed fact, or throws naming the record. */
function toFact(rec: FactRecord, index: number, entities: Map<string, Entity>): Fact {
  const ctx = { index, subject: rec.subject, relation: rec.relation, object: rec.object };
  if (!isRelation(rec.relation)) {
    throw new LoadError(`Unknown relation "${rec.relation}"`, ctx);
  }
  const relation = rec.relation;
  const sig = SIGNATURES[relation];

  const subject = entities.get(rec.subject);
  if (!subject) throw new LoadError(`Fact references undefined subject "${rec.subject}"`, ctx);
  if (!sig.subject.includes(subject.kind)) {
    throw new LoadError(`Relation ${relation} cannot have a ${subject.kind} as subject`, ctx);
  }

  const id = factId(relation, rec.subject, rec.object);

  if (sig.object === 'tier') {
    if (!isTier(rec.object)) throw new LoadError(`Invalid severity tier "${rec.object}"`, ctx);
    return { id, subject: rec.subject, relation: 'has-urgency', object: rec.object };
  }
  if (sig.object === 'hours') {
    if (typeof rec.object !== 'number' || !Number.isInteger(rec.object) || rec.object <= 0) {
      throw new LoadError(`time-sensitive hours must be a positive integer`, ctx);
    }
    return { id, subject: rec.subject, relation: 'time-sensitive', object: rec.object };
  }

  if (typeof rec.object !== 'string') throw new LoadError(`Relation ${relation} needs an entity object`, ctx);
  const objectId = rec.object;
  const object = entities.get(objectId);
  if (!object) throw new LoadError(`Fact references undefined object "${objectId}"`, ctx);
  if (!sig.object.includes(object.kind)) {
    throw new LoadError(`Relation ${relation} cannot have a ${object.kind} as object`, ctx);
  }

  const base = { id, subject: rec.subject, object: objectId };
  switch (relation) {
    case 'contraindication':
      if (!isContraSeverity(rec.severity)) {
        throw new LoadError(`contraindication needs severity absolute|caution`, { ...ctx, severity: rec.severity ?? null });
      }
      return { ...base, relation, severity: rec.severity };
    case 'drug-interaction':
      if (!isInteractionSeverity(rec.severity)) {
        throw new LoadError(`drug-interaction needs severity major|moderate|minor`, { ...ctx, severity: rec.severity ?? null });
      }
      if (!rec.guidance) throw new LoadError(`drug-interaction needs guidance text`, ctx);
      if (rec.subject === objectId) throw new LoadError(`drug-interaction cannot pair a drug with itself`, ctx);
      if (subject.kind !== 'treatment' && object.kind !== 'treatment') {
        throw new LoadError(`drug-interaction must name at least one treatment`, ctx);
      }
      return { ...base, relation, severity: rec.severity, guidance: rec.guidance };
    case 'requires-dose-adjustment':
      if (!rec.guidance) throw new LoadError(`requires-dose-adjustment needs guidance text`, ctx);
      return { ...base, relation, guidance: rec.guidance };
    case 'requires-lab-test':
    case 'requires-imaging':
      return { ...base, relation, rationale: rec.rationale ?? null };
    case 'differential-from':
      if (rec.subject === objectId) throw new LoadError(`Condition cannot be a differential of itself`, ctx);
      return { ...base, relation };
    case 'has-symptom':
    case 'red-flag-symptom':
    case 'has-treatment':
    case 'evidence-source':
    case 'refers-to-specialist':
      return { ...base, relation };
    default:
      throw new LoadError(`Relation ${relation} has no loader`, ctx);
  }
}

function checkGraph(entities: Entity[], facts: Fact[]) {
  const grouped = new Map<string, Fact[]>();
  const linkedTreatments = new Set<string>();
  for (const f of facts) {
    const k = `${f.subject}|${f.relation}`;
    const list = grouped.get(k);
    if (list) list.push(f);
    else grouped.set(k, [f]);
    if (f.relation === 'has-treatment') linkedTreatments.add(f.object);
  }
  const of = (subject: string, relation: Relation) => grouped.get(`${subject}|${relation}`) ?? [];

  for (const e of entities) {
    if (e.kind === 'condition') {
      const urgency = of(e.id, 'has-urgency');
      if (urgency.length !== 1) {
        throw new LoadError(`Condition needs exactly one has-urgency fact`, { condition: e.id, found: urgency.length });
      }
      if (of(e.id, 'time-sensitive').length > 1) {
        throw new LoadError(`Condition has more than one time-sensitive fact`, { condition: e.id, relation: 'time-sensitive' });
      }
      const symptoms = new Set(of(e.id, 'has-symptom').map(f => String(f.object)));
      if (symptoms.size === 0) throw new LoadError(`Condition has no symptoms`, { condition: e.id, relation: 'has-symptom' });
      const flags = of(e.id, 'red-flag-symptom');
      if (flags.length === 0) {
        throw new LoadError(`Condition has no red-flag symptoms`, { condition: e.id, relation: 'red-flag-symptom' });
      }
      for (const f of flags) {
        if (!symptoms.has(String(f.object))) {
          throw new LoadError(`Red flag is not one of the condition's symptoms`, {
            condition: e.id, relation: 'red-flag-symptom', symptom: String(f.object),
          });
        }
      }
    }
    if (e.kind === 'treatment' && !linkedTreatments.has(e.id)) {
      throw new LoadError(`Treatment is not linked to any condition`, { treatment: e.id, relation: 'has-treatment' });
    }
  }
}

/** JSON with object keys sorted, so equal content always hashes the same. */
function canonical(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(canonical).join(',')}]`;
  if (value !== null && typeof value === 'object') {
    const fields = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonical(v)}`);
    return `{${fields.join(',')}}`;
  }
  return JSON.stringify(value);
}

// Covers every fact field (severity, guidance, rationale), not only the triple.
function fingerprint(doc: FactDocument, facts: Fact[]): string {
  const h = createHash('sha256');
  h.update(doc.version);
  for (const fact of [...facts].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))) {
    h.update(`${canonical(fact)}\n`);
  }
  for (const e of [...doc.entities].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))) {
    h.update(`${canonical(e)}\n`);
  }
  return h.digest('hex').slice(0, 12);
}

/**
 * Parses and checks a fact source, then builds the indexed store. Any problem
 * raises a LoadError naming the offending record; nothing is partially loaded.
 */
export function loadFactStore(source: FactSource): FactStore {
  const { raw, origin } = readSource(source);

  const parsed = FactDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LoadError(`Malformed fact source: ${formatZodError(parsed.error)}`, { origin });
  }
  const doc = parsed.data;

  const entities = new Map<string, Entity>();
  for (const e of doc.entities) {
    if (entities.has(e.id)) throw new LoadError(`Duplicate entity "${e.id}"`, { origin, entity: e.id });
    entities.set(e.id, e);
  }

  const facts: Fact[] = [];
  const seen = new Set<string>();
  doc.facts.forEach((rec, index) => {
    const fact = toFact(rec, index, entities);
    if (seen.has(fact.id)) throw new LoadError(`Duplicate fact ${fact.id}`, { origin, index, relation: fact.relation });
    seen.add(fact.id);
    facts.push(fact);
  });

  checkGraph(doc.entities, facts);

  return new FactStore(doc.entities, facts, {
    version: doc.version,
    fingerprint: fingerprint(doc, facts),
    origin,
    loadedAt: new Date().toISOString(),
  });
}
