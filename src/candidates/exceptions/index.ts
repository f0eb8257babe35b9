export { ProxyListReadException } from './proxy-list-read.exception';
