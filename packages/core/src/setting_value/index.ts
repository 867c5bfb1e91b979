export { parseSettingValue } from './setting_value';
export { InvalidSettingValueError } from './errors';
