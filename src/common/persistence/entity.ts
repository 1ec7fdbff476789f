/**
 * Identity shared by every persisted entity
 */
export interface Entity {
  id: string;
  createdAt: Date;
}

export interface SoftDeletableEntity extends Entity {
  isDeleted: boolean;
}

/**
 * Raw MongoDB document shape: the entity id is stored in `_id`
 */
export interface BaseDocument {
  _id: string;
  createdAt: Date;
}

/**
 * Converts between domain entities and their stored documents.
 * `toDocument` only emits persisted fields, never loaded relations.
 */
export interface DocumentMapper<T extends Entity, TDoc extends BaseDocument> {
  toDocument(entity: T): TDoc;
  toEntity(document: TDoc): T;
}
