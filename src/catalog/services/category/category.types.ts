import { PageFilter } from '../../../common/pagination';
import { SoftDeletableEntity } from '../../../common/persistence/entity';
import { RegistryHolder } from '../registry-holder/registry-holder.types';

export interface Category extends SoftDeletableEntity {
  registryHolderId: string;
  name: string;
  income: boolean;
  expense: boolean;
  emoji: string;
  icon: string;
  parentId: string | null;
  registryHolder?: RegistryHolder;
  parent?: Category;
}

export interface CategoryFilter extends PageFilter {
  registryHolderId?: string;
  nameContains?: string;
  income?: boolean;
  expense?: boolean;
  parentId?: string;
  includeDeleted?: boolean;
}

export interface CreateCategoryDto {
  registryHolderId: string;
  name: string;
  income?: boolean;
  expense?: boolean;
  emoji?: string;
  icon?: string;
  parentId?: string | null;
}

/**
 * `parentId: null` detaches the category from its parent; an absent
 * `parentId` leaves it unchanged
 */
export interface UpdateCategoryDto {
  id: string;
  name?: string;
  income?: boolean;
  expense?: boolean;
  emoji?: string;
  icon?: string;
  parentId?: string | null;
}
