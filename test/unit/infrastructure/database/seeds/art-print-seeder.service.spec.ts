import { Test, TestingModule } from '@nestjs/testing';
import { getConnectionToken } from '@nestjs/mongoose';
import { ArtPrintSeederService } from '@infrastructure/database/seeds';
import { IArtPrintRepositoryPort } from '@application/ports/outbound';
import { ArtPrintDraft } from '@domain/entities';

describe('ArtPrintSeederService', () => {
  let seeder: ArtPrintSeederService;
  let mockArtPrintRepository: jest.Mocked<IArtPrintRepositoryPort>;
  let connection: { readyState: number };

  beforeEach(async () => {
    mockArtPrintRepository = {
      create: jest.fn(),
      createMany: jest.fn(),
      findById: jest.fn(),
      findAll: jest.fn(),
      count: jest.fn(),
    };
    connection = { readyState: 1 };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ArtPrintSeederService,
        { provide: 'IArtPrintRepository', useValue: mockArtPrintRepository },
        { provide: getConnectionToken(), useValue: connection },
      ],
    }).compile();

    seeder = module.get(ArtPrintSeederService);
  });

  describe('seedIfEmpty', () => {
    it('should insert the four sample prints into an empty catalog', async () => {
      // Arrange
      mockArtPrintRepository.count.mockResolvedValue(0);
      mockArtPrintRepository.createMany.mockImplementation((drafts: readonly ArtPrintDraft[]) =>
        Promise.resolve(drafts.length),
      );

      // Act
      const result = await seeder.seedIfEmpty();

      // Assert
      expect(result).toEqual({ status: 'seeded', inserted: 4 });
      const drafts = mockArtPrintRepository.createMany.mock.calls[0][0];
      expect(drafts.map((draft) => draft.title)).toEqual([
        'Sunlit Dunes',
        'Coastal Mist',
        'City Geometry',
        'Botanical Study',
      ]);
      expect(drafts.filter((draft) => draft.featured)).toHaveLength(2);
      expect(drafts.every((draft) => draft.inStock)).toBe(true);
    });

    it('should skip a catalog that already has prints', async () => {
      // Arrange
      mockArtPrintRepository.count.mockResolvedValue(7);

      // Act
      const result = await seeder.seedIfEmpty();

      // Assert
      expect(result).toEqual({ status: 'skipped', reason: 'Catalog already holds 7 prints' });
      expect(mockArtPrintRepository.createMany).not.toHaveBeenCalled();
    });

    it('should report unavailable without touching the store when disconnected', async () => {
      // Arrange
      connection.readyState = 0;

      // Act
      const result = await seeder.seedIfEmpty();

      // Assert
      expect(result).toEqual({ status: 'unavailable', reason: 'Store is not connected' });
      expect(mockArtPrintRepository.count).not.toHaveBeenCalled();
    });

    it('should report unavailable instead of throwing when the store fails', async () => {
      // Arrange
      mockArtPrintRepository.count.mockResolvedValue(0);
      mockArtPrintRepository.createMany.mockRejectedValue(new Error('not primary'));

      // Act
      const result = await seeder.seedIfEmpty();

      // Assert
      expect(result).toEqual({ status: 'unavailable', reason: 'not primary' });
    });
  });

  describe('getStats', () => {
    it('should count all and featured prints', async () => {
      // Arrange
      mockArtPrintRepository.count.mockImplementation((filter) =>
        Promise.resolve(filter?.featured ? 2 : 4),
      );

      // Act
      const stats = await seeder.getStats();

      // Assert
      expect(stats).toEqual({ totalPrints: 4, featuredPrints: 2 });
      expect(mockArtPrintRepository.count).toHaveBeenCalledWith({ featured: true });
    });
  });
});
