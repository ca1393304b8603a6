import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { ArtPrint, ArtPrintDraft } from '@domain/entities';
import { PrintId } from '@domain/value-objects';
import { ArtPrintFilter, IArtPrintRepositoryPort } from '@application/ports/outbound';
import { ArtPrintDocument } from '../schemas';
import { ArtPrintMapper } from '../mappers';

/**
 * MongoDB repository for the print catalog (`artprint` collection).
 */
@Injectable()
export class MongoArtPrintRepository implements IArtPrintRepositoryPort {
  constructor(
    @InjectModel(ArtPrintDocument.name)
    private readonly artPrintModel: Model<ArtPrintDocument>,
  ) {}

  /**
   * Inserts a print, then reads it back so the caller sees exactly
   * what was stored (defaults, timestamps, assigned id).
   */
  async create(draft: ArtPrintDraft): Promise<ArtPrint> {
    const created = await this.artPrintModel.create(ArtPrintMapper.toDocument(draft));

    const stored = await this.artPrintModel.findById(created._id).lean().exec();
    if (!stored) {
      throw new Error(`Inserted print ${created._id.toHexString()} could not be read back`);
    }

    return ArtPrintMapper.toDomain(stored);
  }

  async createMany(drafts: readonly ArtPrintDraft[]): Promise<number> {
    if (drafts.length === 0) {
      return 0;
    }

    const inserted = await this.artPrintModel.insertMany(
      drafts.map((draft) => ArtPrintMapper.toDocument(draft)),
    );
    return inserted.length;
  }

  async findById(id: PrintId): Promise<ArtPrint | null> {
    const document = await this.artPrintModel.findById(id.toString()).lean().exec();

    if (!document) {
      return null;
    }

    return ArtPrintMapper.toDomain(document);
  }

  async findAll(filter: ArtPrintFilter = {}): Promise<ArtPrint[]> {
    const documents = await this.artPrintModel.find(this.toConditions(filter)).lean().exec();
    return documents.map((doc) => ArtPrintMapper.toDomain(doc));
  }

  async count(filter: ArtPrintFilter = {}): Promise<number> {
    return this.artPrintModel.countDocuments(this.toConditions(filter)).exec();
  }

  private toConditions(filter: ArtPrintFilter): { featured?: boolean } {
    return filter.featured === undefined ? {} : { featured: filter.featured };
  }
}
