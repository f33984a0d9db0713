import { TestPlanInstanceStatus } from '../../src/domain/test-status';
import { TestStatusResolver } from '../../src/engine/status-resolver';
import { captureLogs, FakeTestService } from '../helpers/fakes';

const CHANNEL = '1.32/candidate';
const VERSION = 'k8s-operator-k8s-741-k8s-worker-742';

describe('TestStatusResolver', () => {
  captureLogs();

  test('no product version resolves to null', async () => {
    const service = new FakeTestService();
    expect(await new TestStatusResolver(service).resolve(CHANNEL, VERSION)).toBeNull();
    expect(service.listCalls).toEqual([]);
  });

  test('passed wins over failed and in progress', async () => {
    const service = new FakeTestService();
    service.addInstance(CHANNEL, VERSION, TestPlanInstanceStatus.Failed);
    service.addInstance(CHANNEL, VERSION, TestPlanInstanceStatus.InProgress);
    service.addInstance(CHANNEL, VERSION, TestPlanInstanceStatus.Passed);

    expect(await new TestStatusResolver(service).resolve(CHANNEL, VERSION)).toBe(TestPlanInstanceStatus.Passed);
  });

  test('in progress wins over failed', async () => {
    const service = new FakeTestService();
    service.addInstance(CHANNEL, VERSION, TestPlanInstanceStatus.Failed);
    service.addInstance(CHANNEL, VERSION, TestPlanInstanceStatus.InProgress);

    expect(await new TestStatusResolver(service).resolve(CHANNEL, VERSION)).toBe(TestPlanInstanceStatus.InProgress);
  });

  test('error instances report as failed', async () => {
    const service = new FakeTestService();
    service.addInstance(CHANNEL, VERSION, TestPlanInstanceStatus.Error);

    expect(await new TestStatusResolver(service).resolve(CHANNEL, VERSION)).toBe(TestPlanInstanceStatus.Failed);
    expect(service.listCalls.map(([, status]) => status)).toEqual([
      TestPlanInstanceStatus.Passed,
      TestPlanInstanceStatus.InProgress,
      TestPlanInstanceStatus.Failed,
      TestPlanInstanceStatus.Error,
    ]);
  });

  test('only aborted instances resolve to null', async () => {
    const service = new FakeTestService();
    service.addInstance(CHANNEL, VERSION, TestPlanInstanceStatus.Aborted);

    expect(await new TestStatusResolver(service).resolve(CHANNEL, VERSION)).toBeNull();
  });

  test('other versions on the same channel are not considered', async () => {
    const service = new FakeTestService();
    service.addInstance(CHANNEL, 'k8s-operator-k8s-700-k8s-worker-701', TestPlanInstanceStatus.Passed);

    expect(await new TestStatusResolver(service).resolve(CHANNEL, VERSION)).toBeNull();
  });
});
