import swaggerJsdoc from 'swagger-jsdoc';
import packageJson from '../../package.json';

// Detect if running from compiled code
const isCompiled = __dirname.includes('/dist/');
const baseDir = isCompiled ? './dist/src' : './src';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Pool Fee Tracker API',
      version: packageJson.version,
      description: 'USD transaction fees for the tracked liquidity pool',
    },
    tags: [{ name: 'Fees' }, { name: 'Utility' }],
  },
  apis: [`${baseDir}/endpoints/*.{ts,js}`],
};

export const swaggerSpec = swaggerJsdoc(options);
