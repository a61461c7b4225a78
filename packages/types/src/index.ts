export interface Product {
  id: number;
  name: string;
  slug: string;
  description: string;
}

// Wire shape: field names go out capitalized, exactly as clients expect them.
export interface ProductPayload {
  ID: number;
  Name: string;
  Slug: string;
  Description: string;
}

export const toProductPayload = (p: Product): ProductPayload => ({
  ID: p.id,
  Name: p.name,
  Slug: p.slug,
  Description: p.description,
});
