import mongoose from 'mongoose';
import { createLogger } from '../lib/logger';

const log = createLogger('DatabaseConnection');

export class DatabaseConnection {
    private static instance: DatabaseConnection;
    private isConnected: boolean = false;

    private constructor() {}

    public static getInstance(): DatabaseConnection {
        if (!DatabaseConnection.instance) {
            DatabaseConnection.instance = new DatabaseConnection();
        }
        return DatabaseConnection.instance;
    }

    public async connect(mongoUrl: string): Promise<void> {
        if (this.isConnected) {
            log.info('Database already connected');
            return;
        }

        try {
            await mongoose.connect(mongoUrl, { autoIndex: false });

            // Unique identity and event-key indexes must exist before the first write
            await Promise.all(Object.values(mongoose.models).map((model) => model.createIndexes()));

            this.isConnected = true;
            log.info(
                { host: mongoose.connection.host, name: mongoose.connection.name, models: Object.keys(mongoose.models) },
                'Connected to MongoDB'
            );

            mongoose.connection.on('error', (error) => {
                log.error({ error: error instanceof Error ? error.message : String(error) }, 'MongoDB connection error');
                this.isConnected = false;
            });

            mongoose.connection.on('disconnected', () => {
                log.warn('MongoDB disconnected');
                this.isConnected = false;
            });

            mongoose.connection.on('reconnected', () => {
                log.info('MongoDB reconnected');
                this.isConnected = true;
            });

        } catch (error) {
            log.error({ error: error instanceof Error ? error.message : String(error) }, 'Failed to connect to MongoDB');
            this.isConnected = false;
            throw error;
        }
    }

    public async disconnect(): Promise<void> {
        if (!this.isConnected) {
            return;
        }

        try {
            await mongoose.disconnect();
            this.isConnected = false;
            log.info('Disconnected from MongoDB');
        } catch (error) {
            log.error({ error: error instanceof Error ? error.message : String(error) }, 'Error disconnecting from MongoDB');
            throw error;
        }
    }

    public getConnectionStatus(): boolean {
        return this.isConnected && mongoose.connection.readyState === 1;
    }

    public getConnectionInfo(): {
        isConnected: boolean;
        readyState: number;
        host?: string;
        name?: string;
    } {
        return {
            isConnected: this.isConnected,
            readyState: mongoose.connection.readyState,
            host: mongoose.connection.host,
            name: mongoose.connection.name
        };
    }
}
