import { yamlLoader } from './yaml.loader';
import { DEFAULT_CONFIG_FILE } from '../constants';
import { Config } from '../types';

export { parseConfig, yamlLoader } from './yaml.loader';

export function loader(): Config {
  const configFile = process.env.CONFIG_FILE;
  return yamlLoader(configFile || DEFAULT_CONFIG_FILE, !configFile);
}
