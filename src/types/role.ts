/**
 * Access role of a registry holder
 */
export enum Role {
  User = 'User',
  Administrator = 'Administrator',
}
