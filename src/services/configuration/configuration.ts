import { MalformedConfigurationError } from '@errors/malformedConfiguration.error';
import type { Credentials } from '@models/request.types';
import { debug } from '@services/logger';
import { load } from 'js-yaml';
import JSON5 from 'json5';
import { isEmpty, merge, omitBy } from 'lodash-es';
import { readFileSync } from 'node:fs';
import type { Configuration as ConfigurationModel } from '../../models/configuration.types';
import { configurationSchema } from './configuration.schema';

const readConfigurationFile = (configFilePath: string): unknown => {
  const isJson = configFilePath.endsWith('json') || configFilePath.endsWith('json5');
  const isYaml = configFilePath.endsWith('yml') || configFilePath.endsWith('yaml');
  if (!isJson && !isYaml) throw new MalformedConfigurationError(`unsupported file extension for ${configFilePath}`);

  const data = readFileSync(configFilePath, 'utf8');
  return isJson ? JSON5.parse(data) : load(data);
};

/** Environment values take precedence over the ones found in the configuration file; empty ones are ignored. */
const readEnvironment = (env: NodeJS.ProcessEnv) => {
  const { BTCM_BASE_URL, BTCM_API_KEY, BTCM_API_SECRET, BTCM_API_SECRET_ENCODING } = env;
  const credentials =
    BTCM_API_KEY || BTCM_API_SECRET || BTCM_API_SECRET_ENCODING
      ? omitBy({ key: BTCM_API_KEY, secret: BTCM_API_SECRET, secretEncoding: BTCM_API_SECRET_ENCODING }, isEmpty)
      : undefined;
  return omitBy({ baseUrl: BTCM_BASE_URL, credentials }, isEmpty);
};

class Configuration {
  private configuration: ConfigurationModel;

  constructor() {
    const configFilePath = process.env['BTCM_CONFIG_FILE_PATH'];
    const fileConfiguration = configFilePath ? readConfigurationFile(configFilePath) : {};

    const result = configurationSchema.safeParse(merge({}, fileConfiguration, readEnvironment(process.env)));
    if (!result.success) {
      const issues = result.error.issues.map(({ path, message }) => `${path.join('.') || '(root)'}: ${message}`);
      throw new MalformedConfigurationError(issues.join(', '));
    }

    this.configuration = result.data;
    debug('configuration', `Configuration loaded from ${configFilePath ?? 'environment'}`);
  }

  public getBaseUrl() {
    return this.configuration.baseUrl;
  }

  public getCredentials(): Credentials | undefined {
    const { credentials } = this.configuration;
    if (!credentials) return;
    return { key: credentials.key, secret: Buffer.from(credentials.secret, credentials.secretEncoding) };
  }
}

let instance: Configuration | undefined;

/** Loaded on first use so that importing the client never reads the environment. */
export const getConfig = () => {
  instance ??= new Configuration();
  return instance;
};
