export {
  InProcessChannel,
  type QueryChannel,
  TcpQueryChannel,
  type TcpQueryChannelOptions,
} from './channel'
export { DnsServer, type DnsServerOptions } from './server'
