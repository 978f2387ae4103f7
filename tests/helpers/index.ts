export * from './client.ts'
export * from './constants.ts'
export * from './factories.ts'
export * from './mocks/fetch.mock.ts'
