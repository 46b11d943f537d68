import { PrimaryAssociationReader } from '../repositories/CatalogStore';
import { MultiplePrimaryCategoriesError } from '../errors';

export interface PrimaryCandidate {
  /** Present when an existing association is being updated. */
  id?: string;
  bookId: string;
  primary: boolean;
}

// At most one primary category association per book. Call it while holding
// the book lock; the partial unique index catches anything that slips past.
export class PrimaryCategoryEnforcer {
  constructor(private readonly reader: PrimaryAssociationReader) {}

  async validatePrimary(association: PrimaryCandidate): Promise<void> {
    if (!association.primary) {
      return;
    }

    const others = await this.reader.countPrimaryForBook(association.bookId, association.id);
    if (others > 0) {
      throw new MultiplePrimaryCategoriesError(association.bookId);
    }
  }
}
