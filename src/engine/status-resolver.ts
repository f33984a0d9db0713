/**
 * Test-status resolution.
 *
 * Several test plan instances may exist for one (channel, version) key
 * (retries, manual re-runs). They reduce to one effective status by
 * precedence, never by recency: a single passing run is enough.
 */

import { STATUS_PRECEDENCE, TestPlanInstanceStatus } from '../domain/test-status';
import { TestService } from '../clients/sqa';
import { Logger, logger as rootLogger } from '../logger';

export class TestStatusResolver {
  private readonly log: Logger;

  constructor(
    private readonly testService: TestService,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ module: 'status-resolver' });
  }

  /**
   * Effective status for (channel, version), or null when nothing relevant
   * was ever run. Always queries the service; nothing is cached.
   */
  async resolve(channel: string, version: string): Promise<TestPlanInstanceStatus | null> {
    const productVersions = await this.testService.listProductVersions(channel, version);
    if (productVersions.length === 0) {
      this.log.info('No product version found', { channel, version });
      return null;
    }

    for (const tier of STATUS_PRECEDENCE) {
      for (const status of tier.query) {
        for (const productVersion of productVersions) {
          const instances = await this.testService.listTestPlanInstances(productVersion.uuid, status);
          if (instances.length > 0) {
            this.log.info('Resolved test status', {
              channel,
              version,
              status: tier.report,
              matched: status,
              productVersion: productVersion.uuid,
              instances: instances.length,
            });
            return tier.report;
          }
        }
      }
    }

    this.log.info('No relevant test plan instances', { channel, version });
    return null;
  }
}
