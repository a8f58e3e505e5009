import type {Step} from '../../core/index.js'
import type {StateBucketStore} from './stores.js'
import type {BackendRun} from './types.js'

export function stateBucketStep(store: StateBucketStore): Step<BackendRun> {
  return {
    id: 'state-bucket',
    name: 'Create state bucket',
    async precondition(ctx) {
      return store.exists(ctx.run.backend.bucket)
    },
    async action(ctx) {
      const {bucket, region} = ctx.run.backend
      await store.create(bucket, region)
      ctx.log(`S3 bucket created: ${bucket} (${region})`)
    },
    async postcondition(ctx) {
      return store.exists(ctx.run.backend.bucket)
    }
  }
}

export function bucketVersioningStep(store: StateBucketStore): Step<BackendRun> {
  return {
    id: 'bucket-versioning',
    name: 'Enable bucket versioning',
    async precondition(ctx) {
      return store.versioningEnabled(ctx.run.backend.bucket)
    },
    async action(ctx) {
      await store.enableVersioning(ctx.run.backend.bucket)
    },
    async postcondition(ctx) {
      return store.versioningEnabled(ctx.run.backend.bucket)
    }
  }
}
