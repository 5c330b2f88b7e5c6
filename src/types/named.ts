/**
 * Anything the toolset can list by name (frameworks, tests)
 */
export interface Named {
  getName(): string;
}
