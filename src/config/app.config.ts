import { registerAs } from '@nestjs/config';

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  generatedDir: string;
  frontendFile: string;
}

export default registerAs('app', (): AppConfig => ({
  port: parseInt(process.env.PORT || '8000', 10),
  corsOrigins: process.env.CORS_ORIGINS?.split(',').map(s => s.trim()).filter(Boolean) || ['*'],
  generatedDir: process.env.GENERATED_DIR || 'generated',
  frontendFile: process.env.FRONTEND_FILE || 'public/index.html',
}));
