import { AppConfig } from './config';
import { TogetherAIProvider } from './providers/together';
import { FileConversationLog } from './repositories/FileConversationLog';
import { FileSessionRepository } from './repositories/FileSessionRepository';
import { MongoConversationLog } from './repositories/MongoConversationLog';
import { MongoSessionRepository } from './repositories/MongoSessionRepository';
import { ConversationLogRepository, SessionRepository } from './repositories/types';
import { AIService } from './services/AIService';
import { ConversationManager } from './services/ConversationManager';
import { CustomerDataNormalizer } from './services/CustomerDataNormalizer';
import { EligibilityService } from './services/EligibilityService';
import { OperationExecutor } from './services/OperationExecutor';
import { MockPaymentService } from './services/PaymentService';
import { loadProductCatalog } from './services/ProductCatalog';
import { QuoteCalculator } from './services/QuoteCalculator';
import { SessionStateMachine } from './services/SessionStateMachine';
import { SessionStore } from './services/SessionStore';
import { AIProvider } from './types/ai-provider';
import { logger } from './utils/logger';

export interface Services {
  provider: AIProvider;
  store: SessionStore;
  paymentService: MockPaymentService;
  conversationManager: ConversationManager;
  shutdown(): void;
}

export interface ServiceOverrides {
  provider?: AIProvider;
  sessionRepository?: SessionRepository;
  conversationLog?: ConversationLogRepository;
  random?: () => number;
}

const createRepositories = (
  config: AppConfig
): { sessionRepository: SessionRepository; conversationLog: ConversationLogRepository } =>
  config.storage.driver === 'mongo'
    ? { sessionRepository: new MongoSessionRepository(), conversationLog: new MongoConversationLog() }
    : {
        sessionRepository: new FileSessionRepository(config.storage.sessionsDir),
        conversationLog: new FileConversationLog(config.storage.conversationLogPath),
      };

/**
 * Builds the object graph once per process. Settled payments are fed back
 * into their sessions through the conversation manager.
 */
export const createServices = (config: AppConfig, overrides: ServiceOverrides = {}): Services => {
  logger.level = config.logLevel;
  const repositories = createRepositories(config);
  const sessionRepository = overrides.sessionRepository ?? repositories.sessionRepository;
  const conversationLog = overrides.conversationLog ?? repositories.conversationLog;

  const provider =
    overrides.provider ??
    new TogetherAIProvider({
      apiKey: config.together.apiKey,
      model: config.together.model,
      timeoutMs: config.together.timeoutMs,
      maxRetries: config.together.maxRetries,
      retryBaseDelayMs: config.together.retryBaseDelayMs,
    });

  const catalog = loadProductCatalog(config.data.productCatalogPath);
  const stateMachine = new SessionStateMachine({ autoAdvanceThreshold: config.policy.autoAdvanceThreshold });
  const store = new SessionStore(sessionRepository, { maxSessions: config.storage.maxSessions });
  const paymentService = new MockPaymentService({
    successRate: config.payment.successRate,
    initialDelayMs: config.payment.initialDelayMs,
    processingDelayMs: config.payment.processingDelayMs,
    gatewayBaseUrl: config.payment.gatewayBaseUrl,
    random: overrides.random,
  });

  const executor = new OperationExecutor({
    quoteCalculator: QuoteCalculator.fromFiles(config.data.premiumRatesPath, catalog),
    eligibilityService: new EligibilityService(config.policy),
    catalog,
    paymentService,
    stateMachine,
    defaultReturnUrl: config.payment.defaultReturnUrl,
  });

  const conversationManager = new ConversationManager({
    store,
    aiService: new AIService(provider, config.policy.historyWindow),
    executor,
    stateMachine,
    normalizer: new CustomerDataNormalizer(),
    conversationLog,
    paymentService,
    policy: config.policy,
  });

  const unsubscribe = paymentService.onSettled((payment) => conversationManager.applyPaymentUpdate(payment));

  return {
    provider,
    store,
    paymentService,
    conversationManager,
    shutdown: () => {
      unsubscribe();
      paymentService.shutdown();
    },
  };
};
