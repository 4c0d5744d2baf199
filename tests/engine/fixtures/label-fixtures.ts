import { faker } from '@faker-js/faker';

import type { ContactInfo, ShippingLabel } from '../../../engine/src/models/shipping-label.ts';

export function createContactInfo(overrides: Partial<ContactInfo> = {}): ContactInfo {
  return {
    name: faker.person.fullName(),
    address: `${faker.location.streetAddress()}\n${faker.location.city()}`,
    phoneNumber1: `07${faker.string.numeric(8)}`,
    phoneNumber2: '',
    ...overrides,
  };
}

export function createShippingLabel(overrides: Partial<ShippingLabel> = {}): ShippingLabel {
  return {
    id: `label-${faker.string.alphanumeric(8).toLowerCase()}`,
    fromInfo: createContactInfo(),
    toInfo: createContactInfo(),
    createdAt: new Date('2026-03-01T09:30:00.000Z'),
    codEnabled: false,
    codAmount: 0,
    ...overrides,
  };
}
