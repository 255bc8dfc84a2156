export {
  ConversationService,
  createChannel,
  createTurnMetricsMiddleware,
  type ChannelOptions,
  type GatewayChannel,
} from './conversation-service';
