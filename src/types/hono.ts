/**
 * Extended Hono context variables for authenticated requests
 */
export interface AuthVariables {
  identityId: number;
}
