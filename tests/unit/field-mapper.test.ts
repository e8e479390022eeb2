/**
 * FieldMapper tests
 */

import { describe, it, expect } from 'vitest'
import { ErrorCode, MappingError, ValidationError } from '../../src/errors'
import { FieldMapper } from '../../src/mapping'
import { EntityRegistry } from '../../src/metadata'
import { Address, Invoice, Person } from '../fixtures'

describe('FieldMapper', () => {
  const mapper = new FieldMapper(new EntityRegistry())

  describe('resolve', () => {
    it('maps the id to its native name', () => {
      expect(mapper.resolve(Person, 'id')).toBe('native_id')
      expect(mapper.resolve(Invoice, 'number')).toBe('_id')
    })

    it('maps renamed and unrenamed columns', () => {
      expect(mapper.resolve(Person, 'name')).toBe('name')
      expect(mapper.resolve(Invoice, 'issuedAt')).toBe('issued_at')
    })

    it('resolves dotted paths segment by segment', () => {
      expect(mapper.resolve(Person, 'address.city')).toBe('address.city_name')
      expect(mapper.resolve(Person, 'pets.species')).toBe('pets.species')
    })

    it('rejects unknown fields', () => {
      try {
        mapper.resolve(Person, 'nmae')
        expect.unreachable('resolve should have thrown')
      } catch (error) {
        expect(error).toBeInstanceOf(MappingError)
        expect(error).toMatchObject({
          message: "Unknown field 'nmae' for entity 'Person'",
          code: ErrorCode.UNKNOWN_FIELD,
          entity: 'Person',
          field: 'nmae',
        })
      }
    })

    it('rejects unknown nested segments against the embedded type', () => {
      expect(() => mapper.resolve(Person, 'address.town')).toThrow("Unknown field 'town' for entity 'Address'")
    })

    it('rejects paths through scalar fields', () => {
      expect(() => mapper.resolve(Person, 'name.first')).toThrow("Field 'name' of 'Person' has no nested fields")
      expect(() => mapper.resolve(Person, 'phones.0')).toThrow("Field 'phones' of 'Person' has no nested fields")
    })
  })

  describe('resolveField', () => {
    it('reports the owning entity and whether the field is the id', () => {
      const id = mapper.resolveField(Person, 'id')
      expect(id).toMatchObject({ path: 'native_id', isId: true })
      expect(id.owner.name).toBe('Person')

      const city = mapper.resolveField(Person, 'address.city')
      expect(city).toMatchObject({ path: 'address.city_name', isId: false })
      expect(city.owner.type).toBe(Address)
      expect(city.column.field).toBe('city')
    })
  })

  describe('idField', () => {
    it('returns logical and native id names', () => {
      expect(mapper.idField(Person)).toEqual({ field: 'id', name: 'native_id' })
    })

    it('rejects embeddables', () => {
      expect(() => mapper.idField(Address)).toThrow("Entity 'Address' declares no id")
    })
  })

  describe('normalize', () => {
    it('coerces id values to the declared type', () => {
      expect(mapper.normalize(mapper.resolveField(Person, 'id'), '20')).toBe(20)
      expect(() => mapper.normalize(mapper.resolveField(Person, 'id'), 'twenty')).toThrow(ValidationError)
    })

    it('leaves ids without a declared type alone', () => {
      expect(mapper.normalize(mapper.resolveField(Invoice, 'number'), 20)).toBe(20)
    })

    it('applies column converters', () => {
      expect(mapper.normalize(mapper.resolveField(Invoice, 'total'), 12.5)).toBe(1250)
      expect(mapper.normalize(mapper.resolveField(Invoice, 'issuedAt'), new Date('2024-01-01T00:00:00.000Z')))
        .toBe('2024-01-01T00:00:00.000Z')
    })

    it('passes other values through', () => {
      expect(mapper.normalize(mapper.resolveField(Person, 'age'), 36)).toBe(36)
    })
  })
})
