import { z } from 'zod';

export type ContactInfo = {
  readonly name: string;
  readonly address: string;
  readonly phoneNumber1: string;
  readonly phoneNumber2: string;
};

export type ShippingLabel = {
  readonly id: string;
  readonly fromInfo: ContactInfo;
  readonly toInfo: ContactInfo;
  readonly createdAt: Date;
  readonly codEnabled: boolean;
  /** Cash-on-delivery amount in rupees. */
  readonly codAmount: number;
};

export const EMPTY_CONTACT: ContactInfo = {
  name: '',
  address: '',
  phoneNumber1: '',
  phoneNumber2: '',
};

export const contactInfoSchema = z
  .object({
    name: z.string().default(''),
    address: z.string().default(''),
    phoneNumber1: z.string().optional(),
    // Single-phone records predate the second number.
    phoneNumber: z.string().optional(),
    phoneNumber2: z.string().default(''),
  })
  .transform(
    (value): ContactInfo => ({
      name: value.name,
      address: value.address,
      phoneNumber1: value.phoneNumber1 ?? value.phoneNumber ?? '',
      phoneNumber2: value.phoneNumber2,
    })
  );

export const shippingLabelSchema = z
  .object({
    id: z.string().trim().min(1),
    fromInfo: contactInfoSchema.default(EMPTY_CONTACT),
    toInfo: contactInfoSchema,
    createdAt: z.coerce.date().optional(),
    codEnabled: z.boolean().default(false),
    codAmount: z.number().nonnegative().default(0),
  })
  .strict();

export class ShippingLabelValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('shipping label validation failed');
    this.name = 'ShippingLabelValidationError';
    this.issues = issues;
  }
}

/**
 * @throws ShippingLabelValidationError listing every `path: message` issue found.
 */
export function parseShippingLabel(value: unknown, now: () => Date = () => new Date()): ShippingLabel {
  const result = shippingLabelSchema.safeParse(value);
  if (!result.success) {
    throw new ShippingLabelValidationError(
      result.error.issues.map((issue) => {
        const path = issue.path.length ? issue.path.join('.') : 'label';
        return `${path}: ${issue.message}`;
      })
    );
  }

  const label = result.data;
  return {
    id: label.id,
    fromInfo: label.fromInfo,
    toInfo: label.toInfo,
    createdAt: label.createdAt ?? now(),
    codEnabled: label.codEnabled,
    codAmount: label.codAmount,
  };
}

export function isContactEmpty(contact: ContactInfo): boolean {
  return (
    contact.name === '' &&
    contact.address === '' &&
    contact.phoneNumber1 === '' &&
    contact.phoneNumber2 === ''
  );
}

export function isContactComplete(contact: ContactInfo): boolean {
  return contact.name !== '' && contact.address !== '' && contact.phoneNumber1 !== '';
}

export function contactPhoneNumbers(contact: ContactInfo): string[] {
  return [contact.phoneNumber1, contact.phoneNumber2].filter((phone) => phone !== '');
}

export function formatContactPhones(contact: ContactInfo): string {
  return contactPhoneNumbers(contact).join(' / ');
}

// The sender block is optional on a printed label.
export function isReadyToPrint(label: ShippingLabel): boolean {
  return isContactComplete(label.toInfo);
}

export function shippingLabelDisplayName(label: ShippingLabel): string {
  const fromName = label.fromInfo.name !== '' ? label.fromInfo.name : 'Unknown';
  const toName = label.toInfo.name !== '' ? label.toInfo.name : 'Unknown';
  return `${fromName} → ${toName}`;
}
