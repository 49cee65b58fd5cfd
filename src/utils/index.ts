export { describeConfiguration } from './format';
