// логи в тестах не нужны; конкретные тесты подставляют свой sink
process.env.LOG_LEVEL = 'off';

const realEnv = { ...process.env };
beforeEach(() => { process.env = { ...realEnv }; });
afterAll(() => { jest.restoreAllMocks(); });
jest.setTimeout(15000);

export {};
