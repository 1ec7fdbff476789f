import { PageFilter } from '../../../common/pagination';
import { SoftDeletableEntity } from '../../../common/persistence/entity';

export interface AccountType extends SoftDeletableEntity {
  code: string;
  description: string;
}

export interface AccountTypeFilter extends PageFilter {
  codeContains?: string;
  descriptionContains?: string;
  includeDeleted?: boolean;
}

export interface CreateAccountTypeDto {
  code: string;
  description?: string;
}

export interface UpdateAccountTypeDto {
  id: string;
  code?: string;
  description?: string;
}
