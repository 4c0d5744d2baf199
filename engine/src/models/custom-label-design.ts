import { z } from 'zod';

import {
  labelConfigMapSchema,
  labelConfigToMap,
  type LabelConfig,
  type LabelConfigMap,
} from './label-config.ts';
import {
  labelElementFromParsedMap,
  labelElementMapSchema,
  labelElementToMap,
  type LabelElement,
  type LabelElementMap,
} from './label-element.ts';

export type CustomLabelDesign = {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly labelConfig: LabelConfig;
  readonly elements: readonly LabelElement[];
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly isDefault: boolean;
  readonly previewImagePath?: string;
};

export type CustomLabelDesignPatch = Partial<Omit<CustomLabelDesign, 'elements'>> & {
  elements?: readonly LabelElement[];
};

export type CustomLabelDesignMap = {
  id: string;
  name: string;
  description: string;
  labelConfig: LabelConfigMap;
  elements: LabelElementMap[];
  createdAt: string;
  updatedAt: string;
  isDefault: boolean;
  previewImagePath: string | null;
};

const isoTimestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'expected ISO-8601 timestamp' });

export const customLabelDesignMapSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string(),
  description: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  labelConfig: labelConfigMapSchema,
  elements: z.array(labelElementMapSchema),
  createdAt: isoTimestampSchema,
  updatedAt: isoTimestampSchema,
  isDefault: z
    .boolean()
    .nullish()
    .transform((value) => value ?? false),
  previewImagePath: z.string().nullish(),
});

export class LabelDesignValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('label design validation failed');
    this.name = 'LabelDesignValidationError';
    this.issues = issues;
  }
}

export function updateLabelDesign(
  design: CustomLabelDesign,
  patch: CustomLabelDesignPatch
): CustomLabelDesign {
  return {
    ...design,
    ...patch,
    elements: [...(patch.elements ?? design.elements)],
  };
}

export function addDesignElement(
  design: CustomLabelDesign,
  element: LabelElement,
  updatedAt: Date
): CustomLabelDesign {
  return updateLabelDesign(design, { elements: [...design.elements, element], updatedAt });
}

/** Swaps the element with the same id; designs without that id come back unchanged. */
export function replaceDesignElement(
  design: CustomLabelDesign,
  element: LabelElement,
  updatedAt: Date
): CustomLabelDesign {
  if (!design.elements.some((existing) => existing.id === element.id)) {
    return design;
  }

  return updateLabelDesign(design, {
    elements: design.elements.map((existing) => (existing.id === element.id ? element : existing)),
    updatedAt,
  });
}

export function removeDesignElement(
  design: CustomLabelDesign,
  elementId: string,
  updatedAt: Date
): CustomLabelDesign {
  return updateLabelDesign(design, {
    elements: design.elements.filter((element) => element.id !== elementId),
    updatedAt,
  });
}

export function customLabelDesignToMap(design: CustomLabelDesign): CustomLabelDesignMap {
  return {
    id: design.id,
    name: design.name,
    description: design.description,
    labelConfig: labelConfigToMap(design.labelConfig),
    elements: design.elements.map(labelElementToMap),
    createdAt: design.createdAt.toISOString(),
    updatedAt: design.updatedAt.toISOString(),
    isDefault: design.isDefault,
    previewImagePath: design.previewImagePath ?? null,
  };
}

/**
 * @throws LabelDesignValidationError listing every `path: message` issue found.
 */
export function customLabelDesignFromMap(value: unknown): CustomLabelDesign {
  const result = customLabelDesignMapSchema.safeParse(value);
  if (!result.success) {
    throw new LabelDesignValidationError(
      result.error.issues.map((issue) => {
        const path = issue.path.length ? issue.path.join('.') : 'design';
        return `${path}: ${issue.message}`;
      })
    );
  }

  const map = result.data;
  return {
    id: map.id,
    name: map.name,
    description: map.description,
    labelConfig: { ...map.labelConfig },
    elements: map.elements.map(labelElementFromParsedMap),
    createdAt: new Date(map.createdAt),
    updatedAt: new Date(map.updatedAt),
    isDefault: map.isDefault,
    ...(map.previewImagePath != null ? { previewImagePath: map.previewImagePath } : {}),
  };
}
