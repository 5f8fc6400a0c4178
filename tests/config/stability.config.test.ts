/**
 * Unit Tests for stability configuration and its functional options
 */

import {
    buildStabilityConfig,
    defaultStabilityConfig,
    networkIdleOnlyConfig,
    withCustomCheck,
    withDOMStabilityCheck,
    withNetworkIdleThreshold,
    withNetworkIdleTimeout,
    withResourceWaiting,
    withRetry,
} from '../../src/config/stability.config.js';

describe('stability configuration', () => {
    it('should seed defaults from the environment', () => {
        const config = defaultStabilityConfig();

        expect(config.networkIdleThreshold).toBe(0);
        expect(config.networkIdleTimeout).toBe(500);
        expect(config.domStableTimeout).toBe(500);
        expect(config.maxStabilityWait).toBe(5000);
        expect(config.retryAttempts).toBe(0);
    });

    it('should apply options in order', () => {
        const config = buildStabilityConfig([
            withNetworkIdleThreshold(2),
            withNetworkIdleTimeout(250),
            withNetworkIdleThreshold(1),
            withRetry(4, 50),
        ]);

        expect(config.networkIdleThreshold).toBe(1);
        expect(config.networkIdleTimeout).toBe(250);
        expect(config.retryAttempts).toBe(4);
        expect(config.retryDelay).toBe(50);
    });

    it('should not mutate the base configuration', () => {
        const base = defaultStabilityConfig();

        buildStabilityConfig([withCustomCheck('ready', 'window.ready', 100)], base);

        expect(base.customChecks).toEqual([]);
    });

    it('should reject duplicate custom check names', () => {
        expect(() =>
            buildStabilityConfig([
                withCustomCheck('ready', 'window.a', 100),
                withCustomCheck('ready', 'window.b', 100),
            ])
        ).toThrow('custom check names must be unique');
    });

    it('should reject negative thresholds', () => {
        expect(() => buildStabilityConfig([withNetworkIdleThreshold(-1)])).toThrow(
            '[CONFIG ERROR] Invalid stability configuration: networkIdleThreshold'
        );
    });

    it('should build a network-only configuration', () => {
        const config = networkIdleOnlyConfig(2, 8000);

        expect(config.checkNetworkIdle).toBe(true);
        expect(config.networkIdleThreshold).toBe(2);
        expect(config.checkDOMStability).toBe(false);
        expect(config.waitForImages).toBe(false);
        expect(config.waitForAnimationFrame).toBe(false);
        expect(config.maxStabilityWait).toBe(8000);
        expect(config.retryAttempts).toBe(0);
    });

    it('should toggle individual checks', () => {
        const config = buildStabilityConfig([
            withDOMStabilityCheck(false),
            withResourceWaiting(true, false, true, false),
        ]);

        expect(config.checkDOMStability).toBe(false);
        expect(config.waitForImages).toBe(true);
        expect(config.waitForFonts).toBe(false);
        expect(config.waitForStylesheets).toBe(true);
        expect(config.waitForScripts).toBe(false);
    });
});
