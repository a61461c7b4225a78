import type { Product } from "@product-feedback/types";

// ─── Catalog Store ────────────────────────────────────────
// Built once at start-up, frozen, and shared read-only by every request.
// Six records: a linear scan is all the lookup this needs.

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

export class Catalog {
  private readonly products: readonly Product[];

  constructor(products: readonly Product[]) {
    const seen = new Set<string>();
    for (const p of products) {
      if (!p.slug) throw new CatalogError(`Product ${p.id} has an empty slug`);
      if (seen.has(p.slug)) throw new CatalogError(`Duplicate slug "${p.slug}"`);
      seen.add(p.slug);
    }
    this.products = Object.freeze(products.map((p) => Object.freeze({ ...p })));
  }

  list(): readonly Product[] {
    return this.products;
  }

  /** Absence is `undefined`, never a record with empty fields. */
  findBySlug(slug: string): Product | undefined {
    return this.products.find((p) => p.slug === slug);
  }
}

export const SEED_PRODUCTS: readonly Product[] = [
  {
    id: 1,
    name: "Cards Against Humanity",
    slug: "cah",
    description: "Cards Against Humanity is a party game for horrible people.",
  },
  {
    id: 2,
    name: "Space Team",
    slug: "space-team",
    description:
      "A fast-paced, shouting card game where you work together as a team to repair a busted spaceship.",
  },
  {
    id: 3,
    name: "Sonar",
    slug: "sonar",
    description:
      "You and your teammates control a state-of-the-art submarine and are trying to locate an enemy submarine in order to blow it out of the water before they can do the same to you.",
  },
  {
    id: 4,
    name: "Codenames",
    slug: "codenames",
    description:
      "In Codenames, two teams compete to see who can make contact with all of their agents first.",
  },
  {
    id: 5,
    name: "Dixit",
    slug: "dixit",
    description:
      "Every picture tells a story - but what story will your picture tell? Dixit is the lovingly illustrated game of creative guesswork, where your imagination unlocks the tale.",
  },
  {
    id: 6,
    name: "Ticket To Ride",
    slug: "ticket-to-ride",
    description:
      "Ticket to Ride is a cross-country train adventure where players collect cards of various types of train cars that enable them to claim railway routes connecting cities in various countries around the world.",
  },
];

export const createSeedCatalog = () => new Catalog(SEED_PRODUCTS);
