/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * Real implementations that connect to actual services:
 * - PostgreSQL for scheduled messages and user profiles
 * - Redis for rate limit histories
 * - S3-compatible object storage for media and profile pictures
 * - SNS platform endpoints for push, SMTP (nodemailer) for email
 * - CloudWatch metrics + an SNS topic for delivery failure monitoring
 * - Kinesis for analytics
 */
import {MediaFile, MessageStatus, NewScheduledMessage, ScheduledMessage, UserProfile} from '../domain';
import {Clock, NotificationPayload, PushNotification} from '../types';
import {AnalyticsEvent, DeliveryFailureAlert} from '../pure/types';
import {
  AnalyticsService,
  AppEffects,
  BlobStorage,
  DeliveryScheduler,
  MonitoringService,
  NotificationService,
  RateLimitStore,
  ScheduledMessageRepository,
  UserProfileRepository,
} from '../pure/effects';
import {AwsConfig, EmailConfig, ProductionConfig, StorageConfig} from './types';
import {FatalError, isRetryable, toError, TransientError} from '../resilience/errors';
import {randomUUID} from 'crypto';
import {readFile} from 'fs/promises';
import path from 'path';
import {Pool} from 'pg';
import {createClient} from 'redis';
import nodemailer, {Transporter} from 'nodemailer';
import {DeleteObjectCommand, PutObjectCommand, S3Client} from '@aws-sdk/client-s3';
import {CloudWatchClient, PutMetricDataCommand} from '@aws-sdk/client-cloudwatch';
import {PublishCommand, SNSClient} from '@aws-sdk/client-sns';
import {KinesisClient, PutRecordCommand} from '@aws-sdk/client-kinesis';

// ============================================================================
// Configuration
// ============================================================================

// Load configuration from environment variables
export function loadConfigFromEnv(): ProductionConfig {
  const region = process.env.AWS_DEFAULT_REGION || 'us-east-1';
  return {
    database: {
      host: process.env.DATABASE_HOST || 'localhost',
      port: parseInt(process.env.DATABASE_PORT || '5432', 10),
      user: process.env.DATABASE_USER || 'appuser',
      password: process.env.DATABASE_PASSWORD || 'apppassword',
      database: process.env.DATABASE_NAME || 'timecapsule',
    },
    redis: {
      host: process.env.REDIS_HOST || 'localhost',
      port: parseInt(process.env.REDIS_PORT || '6379', 10),
    },
    storage: {
      bucket: process.env.STORAGE_BUCKET || 'time-capsule-media',
      endpoint: process.env.STORAGE_ENDPOINT || 'http://localhost:4566',
      publicUrl: process.env.STORAGE_PUBLIC_URL || 'http://localhost:4566/time-capsule-media',
    },
    email: {
      host: process.env.SMTP_HOST || 'localhost',
      port: parseInt(process.env.SMTP_PORT || '1025', 10),
      from: process.env.SMTP_FROM || '"Time Capsule" <noreply@example.com>',
    },
    aws: {
      region,
      accessKeyId: process.env.AWS_ACCESS_KEY_ID || 'test',
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY || 'test',
      monitoringEndpoint: process.env.AWS_ENDPOINT_MONITORING || 'http://localhost:4566',
      analyticsEndpoint: process.env.AWS_ENDPOINT_ANALYTICS || 'http://localhost:4567',
      pushEndpoint: process.env.AWS_ENDPOINT_PUSH || 'http://localhost:4566',
      alertTopicArn: process.env.AWS_ALERT_TOPIC_ARN || `arn:aws:sns:${region}:000000000000:time-capsule-alerts`,
      analyticsStream: process.env.AWS_ANALYTICS_STREAM || 'time-capsule-analytics-stream',
    },
    temporal: {
      address: process.env.TEMPORAL_ADDRESS || 'localhost:7233',
      namespace: process.env.TEMPORAL_NAMESPACE || 'default',
      taskQueue: process.env.TEMPORAL_TASK_QUEUE || 'message-delivery',
    },
    apiPort: parseInt(process.env.API_PORT || '3000', 10),
    profileCacheTtlMs: parseInt(process.env.PROFILE_CACHE_TTL_MS || '300000', 10),
  };
}

/**
 * Log the backend error and hand back what callers should see: a
 * TransientError when retrying may help, the original error otherwise.
 */
function unavailable(service: string, error: unknown): Error {
  console.error(`❌ ${service} call failed:`, error);
  return isRetryable(error) ? new TransientError(`${service} unavailable`, error) : toError(error);
}

function awsClientConfig(config: AwsConfig, endpoint: string) {
  return {
    region: config.region,
    endpoint,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
  };
}

// ============================================================================
// PostgreSQL Scheduled Message Repository
// ============================================================================

type MessageRow = {
  id: string;
  sender_id: string;
  recipient_id: string;
  text_content: string;
  image_urls: string[];
  video_url: string | null;
  scheduled_for: Date;
  created_at: Date;
  status: string;
  delivered_at: Date | null;
  failure_reason: string | null;
  retry_count: number;
};

const MESSAGE_COLUMNS = `id, sender_id, recipient_id, text_content, image_urls, video_url, scheduled_for,
  created_at, status, delivered_at, failure_reason, retry_count`;

const STATUSES: readonly MessageStatus[] = ['pending', 'delivered', 'failed'];

function toStatus(value: string): MessageStatus {
  const status = STATUSES.find(known => known === value);
  if (!status) {
    throw new FatalError('internal', `Unknown message status "${value}"`);
  }
  return status;
}

function toMessage(row: MessageRow): ScheduledMessage {
  return {
    id: row.id,
    senderId: row.sender_id,
    recipientId: row.recipient_id,
    textContent: row.text_content,
    imageUrls: row.image_urls,
    videoUrl: row.video_url,
    scheduledFor: row.scheduled_for,
    createdAt: row.created_at,
    status: toStatus(row.status),
    deliveredAt: row.delivered_at,
    failureReason: row.failure_reason,
    retryCount: row.retry_count,
  };
}

class PostgresScheduledMessageRepository implements ScheduledMessageRepository {
  constructor(private pool: Pool) {}

  async insert(message: NewScheduledMessage): Promise<ScheduledMessage> {
    const result = await this.pool.query<MessageRow>(
      `INSERT INTO scheduled_messages
         (sender_id, recipient_id, text_content, image_urls, video_url, scheduled_for, created_at, status,
          delivered_at, failure_reason, retry_count)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
       RETURNING ${MESSAGE_COLUMNS}`,
      [
        message.senderId,
        message.recipientId,
        message.textContent,
        message.imageUrls,
        message.videoUrl,
        message.scheduledFor,
        message.createdAt,
        message.status,
        message.deliveredAt,
        message.failureReason,
        message.retryCount,
      ]
    );
    return toMessage(result.rows[0]);
  }

  async getById(id: string): Promise<ScheduledMessage | null> {
    const result = await this.pool.query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM scheduled_messages WHERE id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : toMessage(result.rows[0]);
  }

  async findPendingBySender(senderId: string): Promise<ScheduledMessage[]> {
    const result = await this.pool.query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM scheduled_messages
       WHERE sender_id = $1 AND status = 'pending'
       ORDER BY scheduled_for ASC`,
      [senderId]
    );
    return result.rows.map(toMessage);
  }

  async findReceived(recipientId: string, now: Date): Promise<ScheduledMessage[]> {
    const result = await this.pool.query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM scheduled_messages
       WHERE recipient_id = $1
         AND (status = 'delivered' OR (status = 'pending' AND scheduled_for <= $2))`,
      [recipientId, now]
    );
    return result.rows.map(toMessage);
  }

  async countSentByStatus(senderId: string): Promise<Record<MessageStatus, number>> {
    const result = await this.pool.query<{ status: string; count: number }>(
      `SELECT status, count(*)::int AS count FROM scheduled_messages
       WHERE sender_id = $1
       GROUP BY status`,
      [senderId]
    );
    const counts: Record<MessageStatus, number> = {pending: 0, delivered: 0, failed: 0};
    for (const row of result.rows) {
      counts[toStatus(row.status)] = row.count;
    }
    return counts;
  }

  async countDeliveredTo(recipientId: string): Promise<number> {
    const result = await this.pool.query<{ count: number }>(
      `SELECT count(*)::int AS count FROM scheduled_messages
       WHERE recipient_id = $1 AND status = 'delivered'`,
      [recipientId]
    );
    return result.rows[0]?.count ?? 0;
  }

  async findReadyForDelivery(now: Date, limit: number): Promise<ScheduledMessage[]> {
    const result = await this.pool.query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM scheduled_messages
       WHERE status = 'pending' AND scheduled_for <= $1
       ORDER BY scheduled_for ASC
       LIMIT $2`,
      [now, limit]
    );
    return result.rows.map(toMessage);
  }

  async findFailed(maxRetryCount: number, limit: number): Promise<ScheduledMessage[]> {
    const result = await this.pool.query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM scheduled_messages
       WHERE status = 'failed' AND retry_count < $1
       ORDER BY failed_at ASC
       LIMIT $2`,
      [maxRetryCount, limit]
    );
    return result.rows.map(toMessage);
  }

  async markDelivered(id: string, deliveredAt: Date): Promise<boolean> {
    // The status guard makes this the single point where a message changes hands
    const result = await this.pool.query(
      `UPDATE scheduled_messages
       SET status = 'delivered', delivered_at = $2, failure_reason = NULL
       WHERE id = $1 AND status = 'pending'`,
      [id, deliveredAt]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async markFailed(id: string, reason: string, failedAt: Date): Promise<void> {
    await this.pool.query(
      `UPDATE scheduled_messages
       SET status = 'failed', failure_reason = $2, failed_at = $3, retry_count = retry_count + 1
       WHERE id = $1`,
      [id, reason, failedAt]
    );
  }

  async resetToPending(id: string): Promise<boolean> {
    const result = await this.pool.query(
      `UPDATE scheduled_messages
       SET status = 'pending', failure_reason = NULL, failed_at = NULL
       WHERE id = $1 AND status = 'failed'`,
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async delete(id: string): Promise<void> {
    await this.pool.query('DELETE FROM scheduled_messages WHERE id = $1', [id]);
  }

  async deleteDeliveredBefore(cutoff: Date, limit: number): Promise<number> {
    const result = await this.pool.query(
      `DELETE FROM scheduled_messages
       WHERE id IN (
         SELECT id FROM scheduled_messages
         WHERE status = 'delivered' AND delivered_at < $1
         LIMIT $2
       )`,
      [cutoff, limit]
    );
    return result.rowCount ?? 0;
  }
}

// ============================================================================
// PostgreSQL User Profile Repository
// ============================================================================

type ProfileRow = {
  id: string;
  username: string;
  email: string | null;
  profile_picture_url: string | null;
  push_endpoint: string | null;
};

class PostgresUserProfileRepository implements UserProfileRepository {
  constructor(private pool: Pool) {}

  async getById(id: string): Promise<UserProfile | null> {
    const result = await this.pool.query<ProfileRow>(
      'SELECT id, username, email, profile_picture_url, push_endpoint FROM user_profiles WHERE id = $1',
      [id]
    );
    if (result.rows.length === 0) {
      return null;
    }
    const row = result.rows[0];
    return {
      id: row.id,
      username: row.username,
      email: row.email,
      profilePictureUrl: row.profile_picture_url,
      pushEndpoint: row.push_endpoint,
    };
  }

  async updateProfilePicture(userId: string, url: string | null): Promise<void> {
    const result = await this.pool.query(
      'UPDATE user_profiles SET profile_picture_url = $2, updated_at = now() WHERE id = $1',
      [userId, url]
    );
    if (!result.rowCount) {
      throw new FatalError('not-found', `User profile ${userId} not found`);
    }
  }
}

// ============================================================================
// Redis Rate Limit Store
// ============================================================================

// Longest window any limit looks back over
const RATE_LIMIT_RETENTION_MS = 24 * 60 * 60 * 1000;

class RedisRateLimitStore implements RateLimitStore {
  constructor(private client: ReturnType<typeof createClient>) {}

  private key(userId: string, operation: string): string {
    return `ratelimit:${operation}:${userId}`;
  }

  async history(userId: string, operation: string, since: Date): Promise<number[]> {
    try {
      const members = await this.client.zRangeByScore(this.key(userId, operation), `(${since.getTime()}`, '+inf');
      // members are "<epoch ms>:<uuid>"
      return members.map(member => Number(member.split(':')[0]));
    } catch (error) {
      throw unavailable('Rate limit store', error);
    }
  }

  async record(userId: string, operation: string, at: Date): Promise<void> {
    const key = this.key(userId, operation);
    const score = at.getTime();
    try {
      await this.client
        .multi()
        .zAdd(key, {score, value: `${score}:${randomUUID()}`})
        .zRemRangeByScore(key, '-inf', score - RATE_LIMIT_RETENTION_MS)
        .pExpire(key, RATE_LIMIT_RETENTION_MS)
        .exec();
    } catch (error) {
      throw unavailable('Rate limit store', error);
    }
  }
}

// ============================================================================
// S3 Blob Storage
// ============================================================================

class S3BlobStorage implements BlobStorage {
  private s3: S3Client;

  constructor(private config: StorageConfig, aws: AwsConfig) {
    this.s3 = new S3Client({
      ...awsClientConfig(aws, config.endpoint),
      forcePathStyle: true,
    });
  }

  async upload(objectPath: string, file: MediaFile): Promise<string> {
    try {
      await this.s3.send(new PutObjectCommand({
        Bucket: this.config.bucket,
        Key: objectPath,
        Body: file.data,
        ContentType: file.contentType,
      }));
      console.log(`📤 Uploaded ${objectPath} (${file.data.byteLength} bytes)`);
      return `${this.config.publicUrl}/${objectPath}`;
    } catch (error) {
      throw unavailable('Storage service', error);
    }
  }

  async remove(objectPath: string): Promise<void> {
    try {
      await this.s3.send(new DeleteObjectCommand({Bucket: this.config.bucket, Key: objectPath}));
    } catch (error) {
      throw unavailable('Storage service', error);
    }
  }
}

// ============================================================================
// SNS Push + Nodemailer Email Notification Service
// ============================================================================

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

class PushAndEmailNotificationService implements NotificationService {
  private sns: SNSClient;
  private transporter: Transporter;

  constructor(private email: EmailConfig, aws: AwsConfig) {
    this.sns = new SNSClient(awsClientConfig(aws, aws.pushEndpoint));
    this.transporter = nodemailer.createTransport({
      host: email.host,
      port: email.port,
      secure: false, // MailHog doesn't use TLS
      ignoreTLS: true,
    });
  }

  async sendPush(notification: PushNotification): Promise<void> {
    const alert = {title: notification.title, body: notification.body};
    try {
      await this.sns.send(new PublishCommand({
        TargetArn: notification.endpoint,
        MessageStructure: 'json',
        Message: JSON.stringify({
          default: notification.body,
          GCM: JSON.stringify({notification: alert, data: notification.data}),
          APNS: JSON.stringify({aps: {alert, sound: 'default'}, ...notification.data}),
        }),
      }));
      console.log(`📱 Push sent to ${notification.endpoint}: ${notification.title}`);
    } catch (error) {
      throw unavailable('Push service', error);
    }
  }

  async sendEmail(payload: NotificationPayload): Promise<void> {
    try {
      await this.transporter.sendMail({
        from: this.email.from,
        to: payload.to,
        subject: payload.subject,
        text: payload.body,
        html: `<p>${escapeHtml(payload.body).replace(/\n/g, '<br>')}</p>`,
      });
      console.log(`📧 Email sent to ${payload.to}: ${payload.subject}`);
    } catch (error) {
      throw unavailable('Email service', error);
    }
  }
}

// ============================================================================
// CloudWatch Monitoring Service (CloudWatch + SNS)
// ============================================================================

class CloudWatchMonitoringService implements MonitoringService {
  private cloudwatch: CloudWatchClient;
  private sns: SNSClient;

  constructor(private config: AwsConfig) {
    this.cloudwatch = new CloudWatchClient(awsClientConfig(config, config.monitoringEndpoint));
    this.sns = new SNSClient(awsClientConfig(config, config.monitoringEndpoint));
  }

  async recordDeliveryFailure(alert: DeliveryFailureAlert): Promise<void> {
    try {
      await this.cloudwatch.send(new PutMetricDataCommand({
        Namespace: 'TimeCapsule',
        MetricData: [
          {
            MetricName: 'DeliveryFailures',
            Value: 1,
            Unit: 'Count',
            Timestamp: new Date(),
          },
        ],
      }));

      await this.sns.send(new PublishCommand({
        TopicArn: this.config.alertTopicArn,
        Subject: 'Time Capsule Alert: Message Delivery Failed',
        Message: `Message ${alert.messageId} failed to deliver (attempt ${alert.retryCount}): ${alert.reason}`,
      }));

      console.log(`Recorded delivery failure for message ${alert.messageId}`);
    } catch (error) {
      throw unavailable('Monitoring service', error);
    }
  }
}

// ============================================================================
// Kinesis Analytics Service
// ============================================================================

class KinesisAnalyticsService implements AnalyticsService {
  private kinesis: KinesisClient;

  constructor(private config: AwsConfig) {
    this.kinesis = new KinesisClient(awsClientConfig(config, config.analyticsEndpoint));
  }

  async trackEvent(event: AnalyticsEvent): Promise<void> {
    try {
      await this.kinesis.send(new PutRecordCommand({
        StreamName: this.config.analyticsStream,
        PartitionKey: event.messageId,
        Data: Buffer.from(JSON.stringify({
          ...event,
          timestamp: new Date().toISOString(),
        })),
      }));
      console.log(`Tracked ${event.event} for message: ${event.messageId}`);
    } catch (error) {
      throw unavailable('Analytics service', error);
    }
  }
}

export const systemClock: Clock = {
  now: () => new Date(),
};

// ============================================================================
// Production EffectsFactory
// ============================================================================

const SCHEMA_PATH = path.join(__dirname, '..', '..', 'sql', 'schema.sql');

class EffectsFactory implements AppEffects {
  private _pool?: Pool;
  private _redisClient?: ReturnType<typeof createClient>;
  private _messageRepository?: ScheduledMessageRepository;
  private _profileRepository?: UserProfileRepository;
  private _storage?: BlobStorage;
  private _rateLimitStore?: RateLimitStore;
  private _notificationService?: NotificationService;
  private _monitoringService?: MonitoringService;
  private _analyticsService?: AnalyticsService;

  readonly clock: Clock = systemClock;

  constructor(private config: ProductionConfig, readonly scheduler: DeliveryScheduler) {}

  private async getPool(): Promise<Pool> {
    if (!this._pool) {
      this._pool = new Pool({
        host: this.config.database.host,
        port: this.config.database.port,
        user: this.config.database.user,
        password: this.config.database.password,
        database: this.config.database.database,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      });

      // Test database connection and apply the schema
      try {
        const client = await this._pool.connect();
        try {
          await client.query(await readFile(SCHEMA_PATH, 'utf8'));
        } finally {
          client.release();
        }
        console.log('✅ Connected to PostgreSQL');
      } catch (error) {
        console.error('❌ Failed to connect to PostgreSQL:', error);
        throw error;
      }
    }
    return this._pool;
  }

  private async getRedisClient(): Promise<ReturnType<typeof createClient>> {
    if (!this._redisClient) {
      this._redisClient = createClient({
        socket: {
          host: this.config.redis.host,
          port: this.config.redis.port,
        },
      });

      this._redisClient.on('error', (err) => console.error('Redis Client Error:', err));

      await this._redisClient.connect();
      console.log('✅ Connected to Redis');
    }
    return this._redisClient;
  }

  private requirePool(): Pool {
    // Synchronous access requires pool to be already initialized
    if (!this._pool) {
      throw new Error('Database pool not initialized. Call initialize() first.');
    }
    return this._pool;
  }

  get messages(): ScheduledMessageRepository {
    if (!this._messageRepository) {
      this._messageRepository = new PostgresScheduledMessageRepository(this.requirePool());
    }
    return this._messageRepository;
  }

  get profiles(): UserProfileRepository {
    if (!this._profileRepository) {
      this._profileRepository = new PostgresUserProfileRepository(this.requirePool());
    }
    return this._profileRepository;
  }

  get storage(): BlobStorage {
    if (!this._storage) {
      this._storage = new S3BlobStorage(this.config.storage, this.config.aws);
    }
    return this._storage;
  }

  get rateLimits(): RateLimitStore {
    if (!this._rateLimitStore) {
      if (!this._redisClient) {
        throw new Error('Redis client not initialized. Call initialize() first.');
      }
      this._rateLimitStore = new RedisRateLimitStore(this._redisClient);
    }
    return this._rateLimitStore;
  }

  get notifications(): NotificationService {
    if (!this._notificationService) {
      this._notificationService = new PushAndEmailNotificationService(this.config.email, this.config.aws);
    }
    return this._notificationService;
  }

  get monitoring(): MonitoringService {
    if (!this._monitoringService) {
      this._monitoringService = new CloudWatchMonitoringService(this.config.aws);
    }
    return this._monitoringService;
  }

  get analytics(): AnalyticsService {
    if (!this._analyticsService) {
      this._analyticsService = new KinesisAnalyticsService(this.config.aws);
    }
    return this._analyticsService;
  }

  /**
   * Initialize all connections (PostgreSQL, Redis)
   * Must be called before using the effects
   */
  async initialize(): Promise<void> {
    await this.getPool();
    await this.getRedisClient();
    console.log('✅ All production effects initialized');
  }

  async close(): Promise<void> {
    await Promise.all([
      this._pool?.end(),
      this._redisClient?.quit(),
    ]);
  }

  /**
   * Static factory method to create and initialize production effects
   */
  static async make(scheduler: DeliveryScheduler, config: ProductionConfig): Promise<EffectsFactory> {
    const effects = new EffectsFactory(config, scheduler);
    await effects.initialize();
    return effects;
  }
}

export type ProductionEffects = AppEffects & {
  close(): Promise<void>;
};

// Export a factory function
export async function makeAppEffects(
  scheduler: DeliveryScheduler,
  config: ProductionConfig = loadConfigFromEnv()
): Promise<ProductionEffects> {
  return EffectsFactory.make(scheduler, config);
}
