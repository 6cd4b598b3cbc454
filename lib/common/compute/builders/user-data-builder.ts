/**
 * @format
 * User Data Script Builder
 *
 * Fluent interface for constructing Linux EC2 user data scripts.
 * Operates directly on a CDK `ec2.UserData` object so that CDK Tokens
 * (e.g. a log group name, `this.stackName`) resolve correctly via
 * CloudFormation's `Fn::Join`.
 *
 * Package commands follow the image's package manager: `dnf` on
 * Amazon Linux 2023, `apt-get` on Ubuntu.
 *
 * @example
 * ```typescript
 * const userData = ec2.UserData.forLinux();
 * new UserDataBuilder(userData, { packageManager: 'dnf' })
 *     .updateSystem()
 *     .installCloudWatchAgent({ logGroupName: logGroup.logGroupName })
 *     .sendCfnSignal({ stackName: stack.stackName, resourceLogicalId: asgLogicalId, region: stack.region })
 *     .addCompletionMarker();
 * ```
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';

// =============================================================================
// TYPES & INTERFACES
// =============================================================================

export type PackageManager = 'dnf' | 'apt-get';

/**
 * Options for the UserDataBuilder constructor.
 */
export interface UserDataBuilderOptions {
    /** @default 'dnf' */
    readonly packageManager?: PackageManager;
    /**
     * Skip the bash preamble (set -euxo pipefail, exec logging).
     * Set to true when the caller has already added preamble to the UserData.
     * @default false
     */
    readonly skipPreamble?: boolean;
}

/**
 * A file tailed by the CloudWatch agent.
 */
export interface ForwardedLogFile {
    readonly filePath: string;
    /** Appended to `{instance_id}` to form the stream name */
    readonly streamSuffix: string;
}

/**
 * Configuration for `installCloudWatchAgent()`.
 */
export interface CloudWatchAgentConfig {
    /** Destination log group (supports CDK Tokens) */
    readonly logGroupName: string;
    /** @default user-data and cloud-init output logs */
    readonly logFiles?: ForwardedLogFile[];
}

/**
 * Configuration for `sendCfnSignal()`. All values support CDK Tokens.
 */
export interface CfnSignalConfig {
    readonly stackName: string;
    /** Logical id of the resource waiting for the signal (ASG or instance) */
    readonly resourceLogicalId: string;
    readonly region: string;
}

export const DEFAULT_FORWARDED_LOGS: ForwardedLogFile[] = [
    { filePath: '/var/log/user-data.log', streamSuffix: 'user-data' },
    { filePath: '/var/log/cloud-init-output.log', streamSuffix: 'cloud-init-output' },
];

const CLOUDWATCH_AGENT_CONFIG_PATH = '/opt/aws/amazon-cloudwatch-agent/etc/amazon-cloudwatch-agent.json';

// =============================================================================
// USER DATA BUILDER CLASS
// =============================================================================

/**
 * Builder class for Linux EC2 user data scripts.
 *
 * Provides a fluent interface: each method returns `this` for chaining.
 */
export class UserDataBuilder {
    private readonly userData: ec2.UserData;
    private readonly packageManager: PackageManager;

    constructor(userData: ec2.UserData, options?: UserDataBuilderOptions) {
        this.userData = userData;
        this.packageManager = options?.packageManager ?? 'dnf';

        if (!options?.skipPreamble) {
            this.userData.addCommands(
                'set -euxo pipefail',
                '',
                '# Log all output',
                'exec > >(tee /var/log/user-data.log) 2>&1',
                '',
                'echo "=== User data script started at $(date) ==="',
            );
        }
    }

    /**
     * Add system update commands.
     */
    updateSystem(): this {
        if (this.packageManager === 'apt-get') {
            this.userData.addCommands(`
# Update system packages
export DEBIAN_FRONTEND=noninteractive
apt-get update -y
apt-get upgrade -y`);
        } else {
            this.userData.addCommands(`
# Update system packages
dnf update -y`);
        }
        return this;
    }

    /**
     * Install the CloudWatch agent and forward log files to a log group.
     *
     * The instance role needs `CloudWatchAgentServerPolicy` (or write access
     * to the log group) for the agent to deliver.
     */
    installCloudWatchAgent(config: CloudWatchAgentConfig): this {
        const logFiles = config.logFiles ?? DEFAULT_FORWARDED_LOGS;
        const agentConfig = {
            logs: {
                logs_collected: {
                    files: {
                        collect_list: logFiles.map((file) => ({
                            file_path: file.filePath,
                            log_group_name: config.logGroupName,
                            log_stream_name: `{instance_id}/${file.streamSuffix}`,
                        })),
                    },
                },
            },
        };

        const install = this.packageManager === 'apt-get'
            ? [
                'curl -sSfL "https://amazoncloudwatch-agent.s3.amazonaws.com/ubuntu/amd64/latest/amazon-cloudwatch-agent.deb" \\',
                '  -o /tmp/amazon-cloudwatch-agent.deb',
                'dpkg -i -E /tmp/amazon-cloudwatch-agent.deb',
                'rm -f /tmp/amazon-cloudwatch-agent.deb',
            ].join('\n')
            : 'dnf install -y amazon-cloudwatch-agent';

        this.userData.addCommands(`
# Install CloudWatch agent and forward logs
echo "=== Installing CloudWatch agent ==="
${install}

mkdir -p "$(dirname ${CLOUDWATCH_AGENT_CONFIG_PATH})"
cat > ${CLOUDWATCH_AGENT_CONFIG_PATH} <<'EOF'
${JSON.stringify(agentConfig, null, 2)}
EOF

/opt/aws/amazon-cloudwatch-agent/bin/amazon-cloudwatch-agent-ctl \\
    -a fetch-config -m ec2 -s -c file:${CLOUDWATCH_AGENT_CONFIG_PATH}
echo "CloudWatch agent started"`);
        return this;
    }

    /**
     * Send a CloudFormation SUCCESS signal for the resource waiting on it.
     * Call after critical setup so a failed bootstrap times out the deploy.
     */
    sendCfnSignal(config: CfnSignalConfig): this {
        const install = this.packageManager === 'apt-get'
            ? [
                '    apt-get install -y python3-pip',
                '    python3 -m pip install https://s3.amazonaws.com/cloudformation-examples/aws-cfn-bootstrap-py3-latest.tar.gz',
                '    CFN_SIGNAL=$(command -v cfn-signal)',
            ].join('\n')
            : '    dnf install -y aws-cfn-bootstrap';

        this.userData.addCommands(`
# =============================================================================
# CloudFormation Signal
# =============================================================================
echo "=== Sending CloudFormation SUCCESS signal ==="

CFN_SIGNAL=/opt/aws/bin/cfn-signal
if [ ! -x "$CFN_SIGNAL" ]; then
    echo "Installing aws-cfn-bootstrap..."
${install}
fi

"$CFN_SIGNAL" --success true \\
    --stack "${config.stackName}" \\
    --resource "${config.resourceLogicalId}" \\
    --region "${config.region}" && echo "Signal sent successfully" || echo "WARNING: cfn-signal failed"`);
        return this;
    }

    /**
     * Add a custom script section (do not include a shebang).
     */
    addCustomScript(script: string): this {
        this.userData.addCommands(script);
        return this;
    }

    /**
     * Add a completion marker to the end of user-data.
     */
    addCompletionMarker(): this {
        this.userData.addCommands(`
echo ""
echo "=============================================="
echo "=== User data completed at $(date) ==="
echo "=============================================="`);
        return this;
    }
}
