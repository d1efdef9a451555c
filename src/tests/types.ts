/**
 * Table-driven test case shared by the suites.
 */
export type TestScenario<TInput, TExpected> = {
  id: string;
  description: string;
  input: TInput;
  expected: TExpected;
};
