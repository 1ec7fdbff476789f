import { Logger } from 'pino';

import { ErrorsFactory } from '../../../common/errors.factory';
import { createServiceLogger } from '../../../observability/logger';
import { DomainError, ErrorCode } from '../../../types/errors';

const ENTITY_NAME = 'Category';

export class CategoryErrorsFactory extends ErrorsFactory {
  constructor(logger: Logger = createServiceLogger('category-errors')) {
    super(logger);
  }

  notFound(id: string): DomainError {
    return this.notFoundError(ErrorCode.CATEGORY_NOT_FOUND, ENTITY_NAME, id);
  }

  nameIsRequired(): DomainError {
    return this.requiredError(ErrorCode.CATEGORY_NAME_REQUIRED, ENTITY_NAME, 'Name');
  }

  nameAlreadyExistsInScope(name: string): DomainError {
    return this.alreadyExistsError(ErrorCode.CATEGORY_NAME_EXISTS, ENTITY_NAME, 'Name', name);
  }

  registryHolderNotFound(registryHolderId: string): DomainError {
    return this.customNotFoundError(
      ErrorCode.CATEGORY_REGISTRYHOLDER_NOT_FOUND,
      `Registry holder with id '${registryHolderId}' not found.`
    );
  }

  parentNotFound(parentId: string): DomainError {
    return this.customNotFoundError(ErrorCode.CATEGORY_PARENT_NOT_FOUND, `Parent category with id '${parentId}' not found.`);
  }

  parentRegistryHolderDiffers(parentId: string): DomainError {
    return this.conflictError(
      ErrorCode.CATEGORY_PARENT_REGISTRYHOLDER_DIFFERS,
      `Parent category '${parentId}' belongs to another registry holder.`
    );
  }

  recursiveParentRelation(id: string, parentId: string): DomainError {
    return this.conflictError(
      ErrorCode.CATEGORY_RECURSIVE_PARENT,
      `Setting parent '${parentId}' for category '${id}' creates a cyclic parent chain.`
    );
  }

  cannotDeleteUsed(id: string): DomainError {
    return this.usedEntityError(ErrorCode.CATEGORY_IN_USE, ENTITY_NAME, id);
  }
}
