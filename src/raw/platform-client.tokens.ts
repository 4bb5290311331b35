export const HOSTING_CLIENT = Symbol('HOSTING_CLIENT');
export const QUALITY_CLIENT = Symbol('QUALITY_CLIENT');
