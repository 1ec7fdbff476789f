export { CategoryService } from './category.service';
export { CategoryRepository, categoryMapper } from './category.repository';
export { CategoryErrorsFactory } from './category.errors';
export { categoryController } from './category.controller';
export { default as categoryRoutes } from './category.routes';
export * from './category.types';
