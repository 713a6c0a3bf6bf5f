import fs from 'fs';
import { z } from 'zod';
import { Variant } from '../types/quote';

const variantDetailsSchema = z.object({
  description: z.string(),
  features: z.array(z.string()),
  pros: z.array(z.string()),
  cons: z.array(z.string()),
});

export const productCatalogSchema = z.object({
  productName: z.string(),
  variants: z.object({
    [Variant.LIFE_SHIELD]: variantDetailsSchema,
    [Variant.LIFE_SHIELD_PLUS]: variantDetailsSchema,
    [Variant.LIFE_SHIELD_ROP]: variantDetailsSchema,
  }),
  policyDocuments: z.array(z.string()),
  requiredKycDocuments: z.array(z.string()),
});

export type ProductCatalog = z.infer<typeof productCatalogSchema>;
export type VariantDetails = z.infer<typeof variantDetailsSchema>;

export const loadProductCatalog = (filePath: string): ProductCatalog =>
  productCatalogSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf8')));
