import {
  CreateBucketCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3'
import type { ExecutionContext, ObjectCommand, ObjectStoreConfig, StorageAdapter } from '@polystore/gateway'
import { ConnectionError, NotFoundError, wrapBackendError } from '@polystore/gateway'

export interface StoredObject {
  readonly key: string
  readonly size: number
}

export interface ObjectInfo extends StoredObject {
  readonly lastModified: string | null
  readonly etag: string | null
}

const DEFAULT_REGION = 'us-east-1'

export function objectStoreEndpoint(config: ObjectStoreConfig): string {
  const secure = config.useSSL === true
  const port = config.port ?? (secure ? 443 : 9000)
  return `${secure ? 'https' : 'http'}://${config.endPoint}:${String(port)}`
}

/**
 * Object store adapter over the S3 API (MinIO speaks it with path-style addressing).
 * The configured bucket is created on connect when it does not exist yet.
 */
export function createObjectAdapter(config: ObjectStoreConfig): StorageAdapter<'object'> {
  const endpoint = objectStoreEndpoint(config)
  const bucket = config.bucket
  const client = new S3Client({
    endpoint,
    region: config.region ?? DEFAULT_REGION,
    forcePathStyle: true,
    credentials: { accessKeyId: config.accessKey, secretAccessKey: config.secretKey },
  })

  function unreachable(err: unknown): ConnectionError {
    return new ConnectionError(
      'CONNECTION_FAILED',
      `Object store unreachable at ${endpoint}`,
      { paradigm: 'object', url: endpoint },
      err instanceof Error ? err : new Error(String(err)),
    )
  }

  async function head(key: string, signal: AbortSignal, kind: 'delete' | 'stat'): Promise<ObjectInfo> {
    try {
      const res = await client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }), { abortSignal: signal })
      return {
        key,
        size: res.ContentLength ?? 0,
        lastModified: res.LastModified?.toISOString() ?? null,
        etag: res.ETag?.replaceAll('"', '') ?? null,
      }
    } catch (err) {
      throw missingOr(err, key, kind)
    }
  }

  async function run(command: ObjectCommand, signal: AbortSignal): Promise<unknown> {
    const options = { abortSignal: signal }
    switch (command.kind) {
      case 'put': {
        await client.send(
          new PutObjectCommand({
            Bucket: bucket,
            Key: command.key,
            Body: command.bytes,
            ContentLength: command.bytes.byteLength,
          }),
          options,
        )
        const stored: StoredObject = { key: command.key, size: command.bytes.byteLength }
        return stored
      }

      case 'get': {
        try {
          const res = await client.send(new GetObjectCommand({ Bucket: bucket, Key: command.key }), options)
          if (res.Body === undefined) return new Uint8Array()
          return await res.Body.transformToByteArray()
        } catch (err) {
          throw missingOr(err, command.key, 'get')
        }
      }

      case 'list': {
        const keys: string[] = []
        let token: string | undefined
        do {
          const page = await client.send(
            new ListObjectsV2Command({
              Bucket: bucket,
              Prefix: command.prefix === '' ? undefined : command.prefix,
              ContinuationToken: token,
            }),
            options,
          )
          for (const item of page.Contents ?? []) {
            if (item.Key !== undefined) keys.push(item.Key)
          }
          token = page.IsTruncated === true ? page.NextContinuationToken : undefined
        } while (token !== undefined)
        return keys.sort()
      }

      case 'delete':
        // S3 deletes are idempotent; the existence check is what reports a missing key.
        await head(command.key, signal, 'delete')
        await client.send(new DeleteObjectCommand({ Bucket: bucket, Key: command.key }), options)
        return undefined

      case 'stat':
        return head(command.key, signal, 'stat')
    }
  }

  return {
    paradigm: 'object',
    concurrency: 'concurrent',

    async connect(): Promise<void> {
      try {
        await client.send(new HeadBucketCommand({ Bucket: bucket }))
      } catch (err) {
        if (!isMissing(err)) throw unreachable(err)
        try {
          await client.send(new CreateBucketCommand({ Bucket: bucket }))
        } catch (createErr) {
          throw unreachable(createErr)
        }
      }
    },

    async disconnect(): Promise<void> {
      client.destroy()
    },

    async healthCheck(): Promise<void> {
      try {
        await client.send(new HeadBucketCommand({ Bucket: bucket }))
      } catch (err) {
        throw unreachable(err)
      }
    },

    async execute(command: ObjectCommand, context: ExecutionContext): Promise<unknown> {
      try {
        return await run(command, context.signal)
      } catch (err) {
        throw wrapBackendError(err, 'object', command.kind)
      }
    },
  }
}

// ── Helpers ────────────────────────────────────────────────────

function isMissing(err: unknown): boolean {
  return err instanceof Error && (err.name === 'NoSuchKey' || err.name === 'NotFound' || err.name === 'NoSuchBucket')
}

function missingOr(err: unknown, key: string, kind: string): Error {
  if (isMissing(err)) return new NotFoundError({ paradigm: 'object', resource: 'object', id: key })
  return wrapBackendError(err, 'object', kind)
}
