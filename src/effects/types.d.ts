// ============================================================================
// Configuration
// ============================================================================

export type DatabaseConfig = {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
}

export type RedisConfig = {
    readonly host: string;
    readonly port: number;
}

export type StorageConfig = {
    readonly bucket: string;
    readonly endpoint: string;
    // prefix of the URLs handed out for uploaded files
    readonly publicUrl: string;
}

export type EmailConfig = {
    readonly host: string;
    readonly port: number;
    readonly from: string;
}

export type AwsConfig = {
    readonly region: string;
    readonly accessKeyId: string;
    readonly secretAccessKey: string;
    readonly monitoringEndpoint: string;
    readonly analyticsEndpoint: string;
    readonly pushEndpoint: string;
    readonly alertTopicArn: string;
    readonly analyticsStream: string;
}

export type TemporalConfig = {
    readonly address: string;
    readonly namespace: string;
    readonly taskQueue: string;
}

export type ProductionConfig = {
    readonly database: DatabaseConfig;
    readonly redis: RedisConfig;
    readonly storage: StorageConfig;
    readonly email: EmailConfig;
    readonly aws: AwsConfig;
    readonly temporal: TemporalConfig;
    readonly apiPort: number;
    readonly profileCacheTtlMs: number;
}
