export * from './docker-gateway'
