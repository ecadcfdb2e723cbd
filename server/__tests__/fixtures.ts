import type { DocumentWithAgencies } from "@shared/schema";
import { MemDocumentStore } from "../storage";

export const EPA = "Environmental Protection Agency";
export const FDA = "Food and Drug Administration";

export type DocumentSeed = {
  id: string;
  title: string | null;
  publicationDate: string | null;
  agencies: string[];
  documentType?: string | null;
  abstract?: string | null;
  excerpt?: string | null;
  fullText?: string | null;
};

export const SAMPLE_DOCUMENTS: DocumentSeed[] = [
  {
    id: "2024-10001",
    title: "Pesticide Tolerances for Glyphosate",
    publicationDate: "2024-03-05",
    agencies: [EPA],
    documentType: "Rule",
    abstract: "This regulation establishes tolerances for residues of glyphosate in or on multiple commodities.",
  },
  {
    id: "2024-10002",
    title: "Air Quality Plans; California; Ozone Standards",
    publicationDate: "2024-03-04",
    agencies: [EPA],
    documentType: "Proposed Rule",
    abstract: "EPA proposes to approve revisions to the California state implementation plan addressing ozone standards.",
  },
  {
    id: "2024-10003",
    title: "Clean Water Act Section 404 Permit Program",
    publicationDate: "2024-03-01",
    agencies: [EPA],
    documentType: "Notice",
    excerpt: "Notice of availability of the draft general permit for discharges of dredged material.",
  },
  {
    id: "2024-10004",
    title: "Medical Devices; Premarket Approval Requirements",
    publicationDate: "2024-03-03",
    agencies: [FDA],
    documentType: "Rule",
    abstract: "The agency is amending premarket approval requirements for certain class III devices.",
  },
  {
    id: "2024-10005",
    title: "Food Labeling: Nutrient Content Claims",
    publicationDate: "2024-02-28",
    agencies: [FDA],
    documentType: "Proposed Rule",
    abstract: "The agency proposes to update the definition of nutrient content claims on food labels.",
  },
];

export async function seedStore(store: MemDocumentStore, seeds: readonly DocumentSeed[]): Promise<MemDocumentStore> {
  for (const seed of seeds) {
    await store.upsertDocument({
      document: {
        id: seed.id,
        documentNumber: seed.id,
        title: seed.title,
        abstract: seed.abstract ?? null,
        excerpt: seed.excerpt ?? null,
        fullText: seed.fullText ?? null,
        documentType: seed.documentType ?? null,
        publicationDate: seed.publicationDate,
        agencies: seed.agencies.map(name => ({ name })),
        contentHash: `hash-${seed.id}`,
      },
      agencies: seed.agencies.map(name => ({ name, rawJson: JSON.stringify({ name }) })),
    });
  }
  return store;
}

export function createSampleStore(options: { fullTextSearch?: boolean } = {}): Promise<MemDocumentStore> {
  return seedStore(new MemDocumentStore(options), SAMPLE_DOCUMENTS);
}

export function makeDocument(overrides: Partial<DocumentWithAgencies> & { id: string }): DocumentWithAgencies {
  return {
    documentNumber: overrides.id,
    title: null,
    abstract: null,
    excerpt: null,
    fullText: null,
    documentType: null,
    publicationDate: null,
    agencies: null,
    htmlUrl: null,
    pdfUrl: null,
    action: null,
    rawJson: null,
    contentHash: null,
    lastUpdated: new Date(0),
    agencyNames: [],
    ...overrides,
  };
}
