import 'dotenv/config';
import { version } from '../../package.json';

export const config = {
    app_name: process.env.APPNAME || 'tokenward',
    environment: process.env.NODE_ENV || 'development',
    isProduction: process.env.NODE_ENV === 'production',
    isTest: process.env.NODE_ENV === 'test',
    version,
};
