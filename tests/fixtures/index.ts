/**
 * @format
 * Test Fixtures - Central Export
 *
 * @example
 * ```typescript
 * import {
 *   createTestApp,
 *   createMockVpcWithSg,
 *   TEST_ENV,
 *   StackAssertions,
 *   Match,
 * } from '../../fixtures';
 * ```
 */

// Constants
export {
    TEST_ENV,
    TEST_ENV_EU,
    createTestEnv,
    TEST_CIDRS,
    DEFAULT_VPC_CONFIG,
    TEST_NETWORK,
    TEST_ACCESS,
} from './constants';

// CDK App and Stack helpers
export {
    createTestApp,
    TEST_FEATURE_FLAGS,
    createHelperStack,
    createStackWithTemplate,
    createStackWithHelper,
    type StackFactoryResult,
    type StackWithHelperResult,
} from './test-app';

// Mock AWS resources
export {
    createMockVpc,
    createMockSecurityGroup,
    createMockVpcWithSg,
    createMockRole,
    type MockVpcOptions,
    type VpcWithSecurityGroup,
} from './mock-resources';

// Assertion helpers
export {
    StackAssertions,
    findIngressRulesByPort,
    singleResourceProperties,
    Match,
} from './assertions';
