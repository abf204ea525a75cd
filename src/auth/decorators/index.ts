export * from './auth.decorator';
export * from './get-user.decorator';
export * from './require-role.decorator';
