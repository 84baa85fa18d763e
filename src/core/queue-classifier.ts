// QueueClassifier - ordered-threshold tier selection, first match wins

import { GENERAL_TIER_ORDER } from './config/queue-configurations.js';
import { QueueConfigurations, QueueTier, QueueTierConfig, UserTier } from './types/queue.js';

export class QueueClassifier {
  constructor(private readonly configurations: QueueConfigurations) {}

  determineOptimalQueue(fileSize: number, complexity: number, userTier: UserTier): QueueTier {
    const priority = this.configurations[QueueTier.PRIORITY];
    if (this.isEligible(priority, userTier) && this.fits(priority, fileSize, complexity)) {
      return QueueTier.PRIORITY;
    }

    const match = GENERAL_TIER_ORDER.find(tier =>
      this.fits(this.configurations[tier], fileSize, complexity)
    );
    return match ?? QueueTier.ULTRA_HEAVY;
  }

  // Bounds are inclusive: a file exactly at max_file_size stays in that tier
  fits(config: QueueTierConfig, fileSize: number, complexity: number): boolean {
    return fileSize <= config.max_file_size && complexity <= config.max_complexity;
  }

  isEligible(config: QueueTierConfig, userTier: UserTier): boolean {
    return !config.eligible_user_tiers || config.eligible_user_tiers.includes(userTier);
  }
}
