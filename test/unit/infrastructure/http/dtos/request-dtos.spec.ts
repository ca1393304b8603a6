import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import {
  CreateOrderRequestDto,
  CreatePrintRequestDto,
  ListPrintsQueryDto,
} from '@infrastructure/http/dtos/request';

// Same transform options as the global ValidationPipe
const toDto = <T extends object>(cls: new () => T, plain: object): T =>
  plainToInstance(cls, plain, { enableImplicitConversion: true });

const failedProperties = (errors: ValidationError[]): string[] =>
  errors.map((error) => error.property);

describe('Request DTOs', () => {
  describe('ListPrintsQueryDto', () => {
    it.each([
      ['true', true],
      ['1', true],
      ['false', false],
      ['0', false],
      ['FALSE', false],
    ])('should read featured=%s as %s', async (raw, expected) => {
      const dto = toDto(ListPrintsQueryDto, { featured: raw });

      expect(dto.featured).toBe(expected);
      expect(await validate(dto)).toHaveLength(0);
    });

    it('should leave featured undefined when absent', async () => {
      const dto = toDto(ListPrintsQueryDto, {});

      expect(dto.featured).toBeUndefined();
      expect(await validate(dto)).toHaveLength(0);
    });

    it('should reject an unrecognised flag', async () => {
      const dto = toDto(ListPrintsQueryDto, { featured: 'maybe' });

      expect(failedProperties(await validate(dto))).toEqual(['featured']);
    });
  });

  describe('CreateOrderRequestDto', () => {
    const validBody = {
      customer_name: 'Jane Doe',
      customer_email: 'jane@example.com',
      shipping_address: '1 Main St',
      items: [{ print_id: '64b7f0c2a1b2c3d4e5f60701', quantity: 2 }],
    };

    it('should accept a valid order', async () => {
      const dto = toDto(CreateOrderRequestDto, validBody);

      expect(await validate(dto)).toHaveLength(0);
    });

    it('should accept an empty item list', async () => {
      const dto = toDto(CreateOrderRequestDto, { ...validBody, items: [] });

      expect(await validate(dto)).toHaveLength(0);
    });

    it('should reject a malformed email', async () => {
      const dto = toDto(CreateOrderRequestDto, { ...validBody, customer_email: 'jane' });

      expect(failedProperties(await validate(dto))).toEqual(['customer_email']);
    });

    it('should reject a zero quantity on a nested item', async () => {
      const dto = toDto(CreateOrderRequestDto, {
        ...validBody,
        items: [{ print_id: '64b7f0c2a1b2c3d4e5f60701', quantity: 0 }],
      });

      const errors = await validate(dto);

      expect(failedProperties(errors)).toEqual(['items']);
      expect(errors[0].children?.[0].children?.[0].constraints).toEqual({
        min: 'quantity must be at least 1',
      });
    });

    it('should reject missing customer fields', async () => {
      const dto = toDto(CreateOrderRequestDto, { items: [] });

      expect(failedProperties(await validate(dto)).sort()).toEqual([
        'customer_email',
        'customer_name',
        'shipping_address',
      ]);
    });
  });

  describe('CreatePrintRequestDto', () => {
    it('should accept the minimal catalog fields', async () => {
      const dto = toDto(CreatePrintRequestDto, { title: 'Sunlit Dunes', artist: 'Ava', price: 49 });

      expect(await validate(dto)).toHaveLength(0);
    });

    it('should reject a negative price', async () => {
      const dto = toDto(CreatePrintRequestDto, { title: 'Sunlit Dunes', artist: 'Ava', price: -1 });

      const errors = await validate(dto);

      expect(failedProperties(errors)).toEqual(['price']);
      expect(errors[0].constraints).toEqual({ min: 'price cannot be negative' });
    });

    it('should reject duplicate tags', async () => {
      const dto = toDto(CreatePrintRequestDto, {
        title: 'Sunlit Dunes',
        artist: 'Ava',
        price: 49,
        tags: ['blue', 'blue'],
      });

      expect(failedProperties(await validate(dto))).toEqual(['tags']);
    });
  });
});
