import { PageFilter } from '../../../common/pagination';
import { Entity } from '../../../common/persistence/entity';
import { Role } from '../../../types/role';

export interface RegistryHolder extends Entity {
  telegramId: number;
  role: Role;
}

export interface RegistryHolderFilter extends PageFilter {
  telegramId?: number;
  role?: Role;
}

export interface CreateRegistryHolderDto {
  telegramId: number;
  role?: Role;
}

export interface UpdateRegistryHolderDto {
  id: string;
  telegramId?: number;
  role?: Role;
}
