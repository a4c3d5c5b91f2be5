import '@testing-library/jest-dom';

// Step failures and report rendering log through console; keep test output readable
const consoleMethods = ['debug', 'info', 'warn', 'error'] as const;
let consoleSpies: jest.SpyInstance[] = [];

beforeEach(() => {
  consoleSpies = consoleMethods.map((method) =>
    jest.spyOn(console, method).mockImplementation(() => undefined)
  );
});

afterEach(() => {
  consoleSpies.forEach((spy) => spy.mockRestore());
  consoleSpies = [];
});
