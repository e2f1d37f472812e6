import { z } from "zod";

/**
 * Resource catalogue shared by planets and explorers. Basic resources are
 * produced directly from a charged energy cell while complex resources are the
 * result of combining exactly two inputs (basic or complex) through a recipe.
 */
export const BASIC_RESOURCE_TYPES = ["Oxygen", "Hydrogen", "Carbon", "Silicon"] as const;

export type BasicResourceType = (typeof BASIC_RESOURCE_TYPES)[number];

export const COMPLEX_RESOURCE_TYPES = ["Water", "Diamond", "Life", "Robot", "Dolphin", "AIPartner"] as const;

export type ComplexResourceType = (typeof COMPLEX_RESOURCE_TYPES)[number];

/** Concrete basic resource instance. The `id` keeps every instance distinct. */
export interface BasicResource<T extends BasicResourceType = BasicResourceType> {
  readonly kind: "basic";
  readonly type: T;
  readonly id: string;
}

/** Concrete complex resource instance produced by a combination recipe. */
export interface ComplexResource<T extends ComplexResourceType = ComplexResourceType> {
  readonly kind: "complex";
  readonly type: T;
  readonly id: string;
}

export type GenericResource = BasicResource | ComplexResource;

/**
 * Combination request submitted by an explorer. Each recipe names its two
 * inputs explicitly so the planet can hand them back untouched when it refuses
 * to combine them.
 */
export type ComplexResourceRequest =
  | { readonly recipe: "Water"; readonly hydrogen: BasicResource<"Hydrogen">; readonly oxygen: BasicResource<"Oxygen"> }
  | { readonly recipe: "Diamond"; readonly carbon: BasicResource<"Carbon">; readonly secondCarbon: BasicResource<"Carbon"> }
  | { readonly recipe: "Life"; readonly water: ComplexResource<"Water">; readonly carbon: BasicResource<"Carbon"> }
  | { readonly recipe: "Robot"; readonly silicon: BasicResource<"Silicon">; readonly life: ComplexResource<"Life"> }
  | { readonly recipe: "Dolphin"; readonly water: ComplexResource<"Water">; readonly life: ComplexResource<"Life"> }
  | { readonly recipe: "AIPartner"; readonly robot: ComplexResource<"Robot">; readonly diamond: ComplexResource<"Diamond"> };

export const BasicResourceTypeSchema = z.enum(BASIC_RESOURCE_TYPES);
export const ComplexResourceTypeSchema = z.enum(COMPLEX_RESOURCE_TYPES);

function basicResourceSchema<T extends BasicResourceType>(type: T) {
  return z.object({ kind: z.literal("basic"), type: z.literal(type), id: z.string().min(1) }).strict();
}

function complexResourceSchema<T extends ComplexResourceType>(type: T) {
  return z.object({ kind: z.literal("complex"), type: z.literal(type), id: z.string().min(1) }).strict();
}

export const ComplexResourceRequestSchema: z.ZodType<ComplexResourceRequest> = z.discriminatedUnion("recipe", [
  z.object({
    recipe: z.literal("Water"),
    hydrogen: basicResourceSchema("Hydrogen"),
    oxygen: basicResourceSchema("Oxygen"),
  }),
  z.object({
    recipe: z.literal("Diamond"),
    carbon: basicResourceSchema("Carbon"),
    secondCarbon: basicResourceSchema("Carbon"),
  }),
  z.object({
    recipe: z.literal("Life"),
    water: complexResourceSchema("Water"),
    carbon: basicResourceSchema("Carbon"),
  }),
  z.object({
    recipe: z.literal("Robot"),
    silicon: basicResourceSchema("Silicon"),
    life: complexResourceSchema("Life"),
  }),
  z.object({
    recipe: z.literal("Dolphin"),
    water: complexResourceSchema("Water"),
    life: complexResourceSchema("Life"),
  }),
  z.object({
    recipe: z.literal("AIPartner"),
    robot: complexResourceSchema("Robot"),
    diamond: complexResourceSchema("Diamond"),
  }),
]);
