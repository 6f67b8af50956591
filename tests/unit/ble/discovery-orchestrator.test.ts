/**
 * Discovery Orchestrator Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DiscoveryOrchestrator } from '../../../src/ble/discovery-orchestrator';
import { Readiness, type ReadinessKind } from '../../../src/ble/readiness';
import { ReadinessStateMachine } from '../../../src/ble/readiness-machine';
import { createSilentLogger } from '../../../src/utils/logger';
import { FakeDriver } from '../../helpers/fake-driver';

const logger = createSilentLogger('test');
const ID = 'sensor-1';

describe('DiscoveryOrchestrator', () => {
  let machine: ReadinessStateMachine;
  let linkUp: boolean;
  let orchestrator: DiscoveryOrchestrator;
  let kinds: ReadinessKind[];

  beforeEach(() => {
    machine = new ReadinessStateMachine({ logger });
    linkUp = true;
    orchestrator = new DiscoveryOrchestrator({
      readiness: machine,
      isLinkUp: () => linkUp,
      stepTimeoutMs: 10_000,
      logger,
    });
    machine.transition(ID, Readiness.connecting);
    machine.transition(ID, Readiness.connected);

    kinds = [];
    machine.onChange((_, next) => kinds.push(next.kind));
  });

  describe('happy path', () => {
    it('should walk every readiness step and end ready', async () => {
      const driver = new FakeDriver(ID, { secondaryChannels: ['battery'], configurable: true });

      const outcome = await orchestrator.runDiscovery(ID, driver, new AbortController().signal);

      expect(outcome).toEqual({ status: 'ready' });
      expect(kinds).toEqual([
        'discoveringServices',
        'servicesDiscovered',
        'discoveringCharacteristics',
        'characteristicsDiscovered',
        'enablingNotifications',
        'ready',
      ]);
      expect(driver.calls).toEqual(['services', 'characteristics', 'notifications', 'secondary:battery', 'configure']);
    });

    it('should skip configuration for drivers without it', async () => {
      const driver = new FakeDriver(ID);

      await orchestrator.runDiscovery(ID, driver, new AbortController().signal);

      expect(driver.calls).toEqual(['services', 'characteristics', 'notifications']);
      expect(machine.get(ID)).toEqual(Readiness.ready);
    });
  });

  describe('mandatory steps', () => {
    it('should fail with the step error and stop', async () => {
      const driver = new FakeDriver(ID);
      driver.failures.set('characteristics', new Error('GATT error 133'));

      const outcome = await orchestrator.runDiscovery(ID, driver, new AbortController().signal);

      expect(outcome).toEqual({ status: 'failed', reason: 'GATT error 133' });
      expect(machine.get(ID)).toEqual(Readiness.failed('GATT error 133'));
      expect(driver.calls).toEqual(['services', 'characteristics']);
    });

    describe('timeouts', () => {
      beforeEach(() => {
        vi.useFakeTimers();
      });

      afterEach(() => {
        vi.useRealTimers();
      });

      it('should fail a hung step exactly at the step timeout', async () => {
        const driver = new FakeDriver(ID);
        driver.hangs.add('services');

        const run = orchestrator.runDiscovery(ID, driver, new AbortController().signal);

        await vi.advanceTimersByTimeAsync(9_999);
        expect(machine.get(ID)).toEqual(Readiness.discoveringServices);

        await vi.advanceTimersByTimeAsync(1);
        await expect(run).resolves.toEqual({
          status: 'failed',
          reason: 'Service discovery timed out after 10000 ms',
        });
        expect(machine.get(ID).kind).toBe('failed');
      });

      it('should carry on past a hung best-effort step', async () => {
        const driver = new FakeDriver(ID, { secondaryChannels: ['battery'], configurable: true });
        driver.hangs.add('secondary:battery');

        const run = orchestrator.runDiscovery(ID, driver, new AbortController().signal);
        await vi.advanceTimersByTimeAsync(10_000);

        await expect(run).resolves.toEqual({ status: 'ready' });
        expect(driver.calls).toContain('configure');
      });
    });
  });

  describe('best-effort steps', () => {
    it('should reach ready when a secondary channel fails', async () => {
      const driver = new FakeDriver(ID, { secondaryChannels: ['battery', 'temperature'], configurable: true });
      driver.failures.set('secondary:battery', new Error('Not permitted'));
      driver.failures.set('configure', new Error('Write rejected'));

      const outcome = await orchestrator.runDiscovery(ID, driver, new AbortController().signal);

      expect(outcome).toEqual({ status: 'ready' });
      expect(driver.calls).toEqual([
        'services',
        'characteristics',
        'notifications',
        'secondary:battery',
        'secondary:temperature',
        'configure',
      ]);
    });
  });

  describe('link loss and cancellation', () => {
    it('should not start when the link is already down', async () => {
      linkUp = false;
      const driver = new FakeDriver(ID);

      const outcome = await orchestrator.runDiscovery(ID, driver, new AbortController().signal);

      expect(outcome).toEqual({ status: 'disconnected' });
      expect(driver.calls).toEqual([]);
      expect(machine.get(ID)).toEqual(Readiness.disconnected);
    });

    it('should stop and mark disconnected when the link drops mid-step', async () => {
      const driver = new FakeDriver(ID);
      vi.spyOn(driver, 'discoverServices').mockImplementation(() => {
        linkUp = false;
        return Promise.resolve();
      });
      const characteristics = vi.spyOn(driver, 'discoverCharacteristics');

      const outcome = await orchestrator.runDiscovery(ID, driver, new AbortController().signal);

      expect(outcome).toEqual({ status: 'disconnected' });
      expect(characteristics).not.toHaveBeenCalled();
      expect(machine.get(ID)).toEqual(Readiness.disconnected);
      expect(kinds).not.toContain('servicesDiscovered');
    });

    it('should unwind when the run is aborted', async () => {
      const driver = new FakeDriver(ID);
      driver.hangs.add('notifications');
      const controller = new AbortController();

      const run = orchestrator.runDiscovery(ID, driver, controller.signal);
      await vi.waitFor(() => expect(machine.get(ID)).toEqual(Readiness.enablingNotifications));
      controller.abort();

      await expect(run).resolves.toEqual({ status: 'disconnected' });
      expect(machine.get(ID)).toEqual(Readiness.disconnected);
    });

    it('should leave a readiness set elsewhere in place', async () => {
      const driver = new FakeDriver(ID);
      vi.spyOn(driver, 'discoverServices').mockImplementation(() => {
        machine.transition(ID, Readiness.failed('Bluetooth reset'));
        return Promise.resolve();
      });

      const outcome = await orchestrator.runDiscovery(ID, driver, new AbortController().signal);

      expect(outcome).toEqual({ status: 'disconnected' });
      expect(machine.get(ID)).toEqual(Readiness.failed('Bluetooth reset'));
    });
  });
});
