import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { DEVICE_TYPES, type DeviceTemplate } from "./device";

export const DEFAULT_BROWSER_CATALOG = fileURLToPath(
  new URL("./browser-catalog.json", import.meta.url),
);

type CatalogItem = {
  name: string;
  uri: string;
  device?: DeviceTemplate;
  children?: CatalogItem[];
};

const ParameterTemplateSchema = z
  .object({
    name: z.string().min(1),
    min: z.number(),
    max: z.number(),
    value: z.number(),
    quantized: z.boolean().optional(),
  })
  .strict();

const DeviceTemplateSchema = z
  .object({
    name: z.string().min(1),
    className: z.string().min(1),
    type: z.enum(DEVICE_TYPES),
    parameters: z.array(ParameterTemplateSchema),
  })
  .strict();

const CatalogItemSchema: z.ZodType<CatalogItem> = z.lazy(() =>
  z
    .object({
      name: z.string().min(1),
      uri: z.string().min(1),
      device: DeviceTemplateSchema.optional(),
      children: z.array(CatalogItemSchema).optional(),
    })
    .strict(),
);

const BrowserCatalogSchema = z
  .object({
    categories: z.array(
      z
        .object({
          id: z.string().regex(/^[a-z_]+$/),
          name: z.string().min(1),
          uri: z.string().min(1),
          children: z.array(CatalogItemSchema),
        })
        .strict(),
    ),
  })
  .strict();

export type BrowserCatalog = z.infer<typeof BrowserCatalogSchema>;

export class BrowserItem {
  readonly name: string;
  readonly uri: string;
  readonly device: DeviceTemplate | null;
  readonly children: readonly BrowserItem[];

  constructor(item: CatalogItem) {
    this.name = item.name;
    this.uri = item.uri;
    this.device = item.device ?? null;
    this.children = (item.children ?? []).map((child) => new BrowserItem(child));
  }

  get isFolder(): boolean {
    return this.children.length > 0;
  }

  get isDevice(): boolean {
    return this.device !== null;
  }

  get isLoadable(): boolean {
    return this.device !== null;
  }
}

export type BrowserCategory = {
  /** Attribute-style name such as "audio_effects". */
  id: string;
  item: BrowserItem;
};

/** The host's content browser. Read-only: loading an item goes through the session. */
export class Browser {
  readonly categories: readonly BrowserCategory[];

  constructor(catalog: BrowserCatalog) {
    this.categories = catalog.categories.map((category) => ({
      id: category.id,
      item: new BrowserItem(category),
    }));
  }

  get categoryIds(): string[] {
    return this.categories.map((category) => category.id);
  }

  /** Resolve a top-level category by id or display name, case-insensitively. */
  root(name: string): BrowserItem | null {
    const wanted = name.trim().toLowerCase();
    const match = this.categories.find(
      (category) => category.id === wanted || category.item.name.toLowerCase() === wanted,
    );
    return match?.item ?? null;
  }

  findByUri(uri: string, maxDepth = 10): BrowserItem | null {
    const visit = (item: BrowserItem, depth: number): BrowserItem | null => {
      if (item.uri === uri) {
        return item;
      }
      if (depth >= maxDepth) {
        return null;
      }
      for (const child of item.children) {
        const found = visit(child, depth + 1);
        if (found) {
          return found;
        }
      }
      return null;
    };

    for (const category of this.categories) {
      const found = visit(category.item, 0);
      if (found) {
        return found;
      }
    }
    return null;
  }
}

export function loadBrowserCatalog(filePath = DEFAULT_BROWSER_CATALOG): Browser {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  const result = BrowserCatalogSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid browser catalog ${filePath}: ${details}`);
  }
  return new Browser(result.data);
}
