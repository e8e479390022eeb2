/**
 * Test Fixtures
 *
 * Entity classes shared across the suite, with their definitions on a
 * static `entity` property.
 */

import type { EntityDefinition } from '../src/metadata'
import type { AttributeConverter } from '../src/types'

// =============================================================================
// Converters
// =============================================================================

/** Stores Dates as ISO-8601 strings */
export const isoDate: AttributeConverter<Date, string> = {
  toDocument: (date) => date.toISOString(),
  toEntity: (value) => new Date(value),
}

/** Stores amounts in cents */
export const cents: AttributeConverter<number, number> = {
  toDocument: (amount) => Math.round(amount * 100),
  toEntity: (value) => value / 100,
}

// =============================================================================
// Entities
// =============================================================================

export class Address {
  static readonly entity: EntityDefinition = {
    embeddable: true,
    columns: { street: true, city: 'city_name', zip: true },
  }

  street = ''
  city = ''
  zip?: string
}

export class Pet {
  static readonly entity: EntityDefinition = {
    embeddable: true,
    columns: { name: true, species: true },
  }

  name = ''
  species = ''
}

export class Person {
  static readonly entity: EntityDefinition = {
    id: { field: 'id', name: 'native_id', type: 'number' },
    columns: {
      name: true,
      age: true,
      address: { embedded: Address },
      phones: { list: true },
      pets: { list: Pet },
    },
  }

  id?: number
  name = ''
  age = 0
  address?: Address
  phones: string[] = []
  pets: Pet[] = []
}

export class Invoice {
  static readonly entity: EntityDefinition = {
    collection: 'invoices',
    id: 'number',
    columns: {
      total: { name: 'total_cents', converter: cents },
      issuedAt: { name: 'issued_at', converter: isoDate },
      paid: true,
    },
  }

  number?: string
  total = 0
  issuedAt = new Date(0)
  paid = false
}

/** Class with no definition anywhere */
export class Unmapped {
  value = 1
}

// =============================================================================
// Builders
// =============================================================================

export function address(street: string, city: string, zip?: string): Address {
  const result = new Address()
  result.street = street
  result.city = city
  if (zip !== undefined) result.zip = zip
  return result
}

export function pet(name: string, species: string): Pet {
  const result = new Pet()
  result.name = name
  result.species = species
  return result
}

export function person(fields: Partial<Person> = {}): Person {
  return Object.assign(new Person(), fields)
}

export function invoice(fields: Partial<Invoice> = {}): Invoice {
  return Object.assign(new Invoice(), fields)
}

/**
 * A value typed as T that is actually undefined, for exercising runtime
 * validation of inputs the type system rules out
 */
export function absent<T>(value: null | undefined = undefined): T {
  return Reflect.get({ value }, 'value')
}
