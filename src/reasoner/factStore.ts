import type {
  Condition,
  ContraindicationRule,
  DoseAdjustmentRule,
  DrugInteractionRule,
  Requirement,
  Symptom,
  Treatment,
} from '../types.js';
import type { Entity, EntityKind, Fact, FactOf, Relation, SeverityTier, TriggerEntity } from './facts.js';

export type StoreMetadata = {
  version: string;
  fingerprint: string;
  origin: string;
  loadedAt: string;
};

type Indexes = {
  byId: Map<string, Fact>;
  bySubject: Map<string, Fact[]>;
  byRelation: Map<Relation, Fact[]>;
  bySubjectRelation: Map<string, Fact[]>;
  byObjectRelation: Map<string, Fact[]>;
};

const key = (id: string | number, relation: Relation) => `${relation}\u0000${id}`;

function push<K>(map: Map<K, Fact[]>, k: K, fact: Fact) {
  const list = map.get(k);
  if (list) list.push(fact);
  else map.set(k, [fact]);
}

function buildIndexes(facts: readonly Fact[]): Indexes {
  const idx: Indexes = {
    byId: new Map(),
    bySubject: new Map(),
    byRelation: new Map(),
    bySubjectRelation: new Map(),
    byObjectRelation: new Map(),
  };
  for (const f of facts) {
    idx.byId.set(f.id, f);
    push(idx.bySubject, f.subject, f);
    push(idx.byRelation, f.relation, f);
    push(idx.bySubjectRelation, key(f.subject, f.relation), f);
    push(idx.byObjectRelation, key(f.object, f.relation), f);
  }
  for (const map of [idx.bySubject, idx.byRelation, idx.bySubjectRelation, idx.byObjectRelation]) {
    for (const list of map.values()) Object.freeze(list);
  }
  return idx;
}

const EMPTY: readonly Fact[] = Object.freeze([]);

function isRelationFact<R extends Relation>(relation: R) {
  return (f: Fact): f is FactOf<R> => f.relation === relation;
}

const sortedUnique = (ids: Iterable<string>) => Array.from(new Set(ids)).sort();

/**
 * Immutable, indexed snapshot of the knowledge graph. Built once by the loader
 * (which has already checked referential integrity) and never mutated; any
 * number of concurrent readers may share an instance.
 */
export class FactStore {
  readonly metadata: Readonly<StoreMetadata>;

  private readonly entities: ReadonlyMap<string, Entity>;
  private readonly facts: readonly Fact[];
  private readonly idx: Indexes;

  private readonly conditions = new Map<string, Condition>();
  private readonly treatments = new Map<string, Treatment>();
  private readonly symptoms = new Map<string, Symptom>();

  constructor(entities: readonly Entity[], facts: readonly Fact[], metadata: StoreMetadata) {
    this.metadata = Object.freeze({ ...metadata });
    this.entities = new Map(entities.map((e): [string, Entity] => [e.id, Object.freeze(e)]));
    this.facts = Object.freeze(facts.map(f => Object.freeze(f)));
    this.idx = buildIndexes(this.facts);

    for (const e of entities) {
      if (e.kind === 'symptom') {
        this.symptoms.set(e.id, Object.freeze({ id: e.id, name: e.name ?? e.id, modifiers: Object.freeze([...(e.modifiers ?? [])]) }));
      }
    }
    for (const e of entities) {
      if (e.kind === 'condition') this.conditions.set(e.id, this.projectCondition(e.id, e.name));
    }
    for (const e of entities) {
      if (e.kind === 'treatment') this.treatments.set(e.id, this.projectTreatment(e.id, e.name));
    }
  }

  // ------- raw lookups

  get size(): number {
    return this.facts.length;
  }

  getFact(id: string): Fact | undefined {
    return this.idx.byId.get(id);
  }

  getEntity(id: string): Entity | undefined {
    return this.entities.get(id);
  }

  hasEntity(id: string, kind?: EntityKind): boolean {
    const e = this.entities.get(id);
    return !!e && (kind === undefined || e.kind === kind);
  }

  bySubject(subject: string): readonly Fact[] {
    return this.idx.bySubject.get(subject) ?? EMPTY;
  }

  byRelation<R extends Relation>(relation: R): readonly FactOf<R>[] {
    return (this.idx.byRelation.get(relation) ?? EMPTY).filter(isRelationFact(relation));
  }

  bySubjectRelation<R extends Relation>(subject: string, relation: R): readonly FactOf<R>[] {
    return (this.idx.bySubjectRelation.get(key(subject, relation)) ?? EMPTY).filter(isRelationFact(relation));
  }

  byObjectRelation<R extends Relation>(object: string, relation: R): readonly FactOf<R>[] {
    return (this.idx.byObjectRelation.get(key(object, relation)) ?? EMPTY).filter(isRelationFact(relation));
  }

  /** The single fact for an exact triple, if present. */
  findFact<R extends Relation>(subject: string, relation: R, object: string | number): FactOf<R> | undefined {
    return this.bySubjectRelation(subject, relation).find(f => f.object === object);
  }

  // ------- projections

  getCondition(id: string): Condition | undefined {
    return this.conditions.get(id);
  }

  getTreatment(id: string): Treatment | undefined {
    return this.treatments.get(id);
  }

  getSymptom(id: string): Symptom | undefined {
    return this.symptoms.get(id);
  }

  listConditions(): Condition[] {
    return Array.from(this.conditions.values()).sort((a, b) => a.id.localeCompare(b.id));
  }

  listTreatments(): Treatment[] {
    return Array.from(this.treatments.values()).sort((a, b) => a.id.localeCompare(b.id));
  }

  listSymptoms(): Symptom[] {
    return Array.from(this.symptoms.values()).sort((a, b) => a.id.localeCompare(b.id));
  }

  listEntities(kind: EntityKind): string[] {
    const ids: string[] = [];
    for (const e of this.entities.values()) if (e.kind === kind) ids.push(e.id);
    return ids.sort();
  }

  labTests(conditionId: string): Requirement[] {
    return this.bySubjectRelation(conditionId, 'requires-lab-test').map((f): Requirement => ({
      ruleId: f.id, conditionId, itemId: f.object, rationale: f.rationale,
    }));
  }

  imaging(conditionId: string): Requirement[] {
    return this.bySubjectRelation(conditionId, 'requires-imaging').map((f): Requirement => ({
      ruleId: f.id, conditionId, itemId: f.object, rationale: f.rationale,
    }));
  }

  /** Interaction rules naming the drug on either side. */
  interactionsFor(drugId: string): DrugInteractionRule[] {
    const facts = [
      ...this.bySubjectRelation(drugId, 'drug-interaction'),
      ...this.byObjectRelation(drugId, 'drug-interaction'),
    ];
    return facts.map((f): DrugInteractionRule => ({ ruleId: f.id, drugs: [f.subject, f.object], severity: f.severity, guidance: f.guidance }));
  }

  countsByKind(): Record<EntityKind, number> {
    const counts: Record<EntityKind, number> = {
      condition: 0,
      symptom: 0,
      treatment: 0,
      medication: 0,
      trigger: 0,
      'lab-test': 0,
      imaging: 0,
      evidence: 0,
      specialist: 0,
    };
    for (const e of this.entities.values()) counts[e.kind] += 1;
    return counts;
  }

  private trigger(id: string): TriggerEntity {
    const e = this.entities.get(id);
    if (!e || e.kind !== 'trigger') throw new Error(`Fact store built with unresolved trigger "${id}"`);
    return e;
  }

  private projectCondition(id: string, name: string | undefined): Condition {
    const objects = (r: Relation) => sortedUnique(this.bySubjectRelation(id, r).map(f => String(f.object)));
    const urgency = this.bySubjectRelation(id, 'has-urgency')[0];
    const severity: SeverityTier = urgency ? urgency.object : 'common';
    const hours = this.bySubjectRelation(id, 'time-sensitive')[0];

    return Object.freeze({
      id,
      name: name ?? id,
      severity,
      symptoms: Object.freeze(objects('has-symptom')),
      redFlags: Object.freeze(objects('red-flag-symptom')),
      differentialFrom: Object.freeze(objects('differential-from')),
      timeSensitiveHours: hours ? hours.object : null,
      evidence: Object.freeze(objects('evidence-source')),
      treatments: Object.freeze(objects('has-treatment')),
      labTests: Object.freeze(objects('requires-lab-test')),
      imaging: Object.freeze(objects('requires-imaging')),
      specialists: Object.freeze(objects('refers-to-specialist')),
    });
  }

  private projectTreatment(id: string, name: string | undefined): Treatment {
    const contraindications: ContraindicationRule[] = this.bySubjectRelation(id, 'contraindication').map((f): ContraindicationRule => ({
      ruleId: f.id, treatmentId: id, trigger: this.trigger(f.object), severity: f.severity,
    }));
    const doseAdjustments: DoseAdjustmentRule[] = this.bySubjectRelation(id, 'requires-dose-adjustment').map((f): DoseAdjustmentRule => ({
      ruleId: f.id, treatmentId: id, trigger: this.trigger(f.object), guidance: f.guidance,
    }));

    return Object.freeze({
      id,
      name: name ?? id,
      treats: Object.freeze(sortedUnique(this.byObjectRelation(id, 'has-treatment').map(f => f.subject))),
      evidence: Object.freeze(sortedUnique(this.bySubjectRelation(id, 'evidence-source').map(f => f.object))),
      contraindications: Object.freeze(contraindications),
      interactions: Object.freeze(this.interactionsFor(id)),
      doseAdjustments: Object.freeze(doseAdjustments),
    });
  }
}
