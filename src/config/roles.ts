/**
 * Roles every test organization is populated with. Each role gets exactly one
 * user whose name is fixed by {@link USERNAME_FOR_ROLE}.
 */
export enum CommonRole {
  CATALOG_AUTHOR = 'CATALOG_AUTHOR',
  CONSOLE_ACCESS_ONLY = 'CONSOLE_ACCESS_ONLY',
  ORGANIZATION_ADMINISTRATOR = 'ORGANIZATION_ADMINISTRATOR',
  VAPP_AUTHOR = 'VAPP_AUTHOR',
  VAPP_USER = 'VAPP_USER'
}

/** Name of the predefined role in vCloud Director. */
export const ROLE_DISPLAY_NAME: Readonly<Record<CommonRole, string>> = {
  [CommonRole.CATALOG_AUTHOR]: 'Catalog Author',
  [CommonRole.CONSOLE_ACCESS_ONLY]: 'Console Access Only',
  [CommonRole.ORGANIZATION_ADMINISTRATOR]: 'Organization Administrator',
  [CommonRole.VAPP_AUTHOR]: 'vApp Author',
  [CommonRole.VAPP_USER]: 'vApp User'
};

export const USERNAME_FOR_ROLE: Readonly<Record<CommonRole, string>> = {
  [CommonRole.CATALOG_AUTHOR]: 'catalog_author',
  [CommonRole.CONSOLE_ACCESS_ONLY]: 'console_user',
  [CommonRole.ORGANIZATION_ADMINISTRATOR]: 'org_admin',
  [CommonRole.VAPP_AUTHOR]: 'vapp_author',
  [CommonRole.VAPP_USER]: 'vapp_user'
};

export const ALL_ROLES: readonly CommonRole[] = Object.values(CommonRole);

export function usernameForRole(role: CommonRole): string {
  return USERNAME_FOR_ROLE[role];
}

export function roleForUsername(username: string): CommonRole | undefined {
  return ALL_ROLES.find(role => USERNAME_FOR_ROLE[role] === username);
}
