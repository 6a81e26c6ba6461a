import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AiModule } from '../ai/ai.module';
import { ClaudeService } from '../ai/claude.service';
import { MessagingProvider } from '../libs/enums';
import { ClaudeMessagingAdapter } from './claude-messaging.adapter';
import { MESSAGING_ADAPTER, MessagingAdapter } from './messaging-adapter.interface';
import { MessagingService } from './messaging.service';

const logger = new Logger('MessagingModule');

@Module({
	imports: [ConfigModule, AiModule],
	providers: [
		ClaudeMessagingAdapter,
		{
			provide: MESSAGING_ADAPTER,
			inject: [ConfigService, ClaudeService, ClaudeMessagingAdapter],
			useFactory: (configService: ConfigService, claudeService: ClaudeService, claude: ClaudeMessagingAdapter): MessagingAdapter | null => {
				const provider = configService.get<string>('messaging.provider') || MessagingProvider.NONE;
				if (provider === MessagingProvider.CLAUDE) {
					if (claudeService.isConfigured()) {
						logger.log(`✍️ Messaging adapter: claude (${claudeService.getModelName()})`);
						return claude;
					}
					logger.warn('⚠️ MESSAGING_PROVIDER=claude but CLAUDE_API_KEY is not set — brief messaging will be used as-is');
					return null;
				}
				if (provider !== MessagingProvider.NONE) {
					logger.warn(`⚠️ Unknown MESSAGING_PROVIDER "${provider}" — brief messaging will be used as-is`);
				}
				return null;
			},
		},
		MessagingService,
	],
	exports: [MessagingService],
})
export class MessagingModule { }
