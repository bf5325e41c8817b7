import env from '@fastify/env'
import type { Config } from '@root/types/config.types.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const schema = {
  type: 'object',
  required: [],
  properties: {
    dbPath: {
      type: 'string',
      default: './data/db/medialist-sync.db',
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    changeHistoryLimit: {
      type: 'number',
      minimum: 1,
      default: 50,
    },
    mappingConcurrency: {
      type: 'number',
      minimum: 1,
      default: 10,
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    fastify.log.debug(
      {
        dbPath: fastify.config.dbPath,
        changeHistoryLimit: fastify.config.changeHistoryLimit,
        mappingConcurrency: fastify.config.mappingConcurrency,
      },
      'Configuration loaded',
    )
  },
  {
    name: 'config',
  },
)
