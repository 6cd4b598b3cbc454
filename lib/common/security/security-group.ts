/**
 * @format
 * Security Group Constructs
 *
 * Construct hierarchy:
 * - BaseSecurityGroupConstruct: bare SG with no default rules, plus helpers
 *   to add CIDR / security-group ingress.
 * - InstanceSecurityGroupConstruct: SG for EC2 instances and fleets with a
 *   configurable ingress rule list, optional management access (SSH on Linux,
 *   RDP on Windows) from trusted CIDRs, and all or restricted egress.
 *
 * Tag strategy:
 * Only Component/Purpose tags are applied here. Organizational tags
 * (Environment, Project, Owner, ManagedBy) come from TaggingAspect at app level.
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

import { HTTPS_PORT, HTTP_PORT, RDP_PORT, SSH_PORT } from '../../config/defaults';
import { IngressProtocol } from '../../config/compute';
import { describeCidr } from '../../utilities/naming';
import { assertValid, validateCidr, validatePort, validatePortRange } from '../../utilities/validation';

// =============================================================================
// Base Security Group Construct
// =============================================================================

/**
 * Props for BaseSecurityGroupConstruct
 */
export interface BaseSecurityGroupConstructProps {
    /** VPC for the security group */
    readonly vpc: ec2.IVpc;
    /** Security group name */
    readonly securityGroupName: string;
    /** Description for the security group */
    readonly description: string;
    /** Allow all outbound traffic @default true */
    readonly allowAllOutbound?: boolean;
    /** Name prefix for tagging @default 'app' */
    readonly namePrefix?: string;
}

/**
 * Base security group construct: minimal, no default rules.
 *
 * @example
 * ```typescript
 * const sgConstruct = new BaseSecurityGroupConstruct(this, 'BastionSG', {
 *     vpc,
 *     securityGroupName: 'bastion-sg',
 *     description: 'Security group for the bastion host',
 *     allowAllOutbound: false,
 * });
 * sgConstruct.addIngressFromCidr('10.0.0.0/16', 22, 'SSH from the VPC');
 * ```
 */
export class BaseSecurityGroupConstruct extends Construct {
    /** The security group */
    public readonly securityGroup: ec2.SecurityGroup;

    constructor(scope: Construct, id: string, props: BaseSecurityGroupConstructProps) {
        super(scope, id);

        this.securityGroup = new ec2.SecurityGroup(this, 'SecurityGroup', {
            vpc: props.vpc,
            securityGroupName: props.securityGroupName,
            description: props.description,
            allowAllOutbound: props.allowAllOutbound ?? true,
        });

        cdk.Tags.of(this.securityGroup).add(
            'Component',
            `${props.namePrefix ?? 'app'}-security-group`,
        );
    }

    /**
     * Add a TCP ingress rule for a port from a CIDR.
     */
    addIngressFromCidr(cidr: string, port: number, description: string): void {
        assertValid(validateCidr(cidr));
        assertValid(validatePort(port));
        this.securityGroup.addIngressRule(
            ec2.Peer.ipv4(cidr),
            ec2.Port.tcp(port),
            description,
        );
    }

    /**
     * Add a TCP ingress rule for a port from another security group
     */
    addIngressFromSecurityGroup(
        sourceSecurityGroup: ec2.ISecurityGroup,
        port: number,
        description: string,
    ): void {
        assertValid(validatePort(port));
        this.securityGroup.addIngressRule(
            sourceSecurityGroup,
            ec2.Port.tcp(port),
            description,
        );
    }
}

// =============================================================================
// Instance Security Group Construct
// =============================================================================

/**
 * One ingress rule. The source is either a CIDR or a peer security group.
 * tcp/udp rules take `port` or `fromPort`/`toPort`; icmp and all take neither.
 */
export interface IngressRule {
    readonly protocol?: IngressProtocol;
    readonly port?: number;
    readonly fromPort?: number;
    readonly toPort?: number;
    readonly cidr?: string;
    readonly sourceSecurityGroup?: ec2.ISecurityGroup;
    readonly description: string;
}

/** Rendered ingress rule, as reported by `ingressRules` */
export interface IngressRuleSummary {
    readonly protocol: IngressProtocol;
    readonly ports: string;
    readonly source: string;
    readonly description: string;
}

/** Management protocol opened by `allowRemoteAccess` */
export type RemoteAccessProtocol = 'ssh' | 'rdp';

/**
 * Props for InstanceSecurityGroupConstruct
 */
export interface InstanceSecurityGroupConstructProps {
    readonly vpc: ec2.IVpc;
    /** Application ingress rules @default [] */
    readonly ingressRules?: IngressRule[];
    /**
     * Open the management port to `trustedCidrs`.
     * @default undefined (no management port)
     */
    readonly remoteAccess?: RemoteAccessProtocol;
    /** CIDRs allowed on the management port @default [] */
    readonly trustedCidrs?: string[];
    /** Limit egress to HTTP and HTTPS @default false */
    readonly restrictEgress?: boolean;
    /**
     * Environment-aware name prefix, e.g. 'instance-development'.
     * @default 'ec2'
     */
    readonly namePrefix?: string;
    /** @default 'Security group for EC2 instances' */
    readonly description?: string;
}

/**
 * Security group for EC2 instances and Auto Scaling fleets.
 *
 * @example
 * ```typescript
 * const sg = new InstanceSecurityGroupConstruct(this, 'SG', {
 *     vpc,
 *     namePrefix: 'instance-production',
 *     remoteAccess: 'ssh',
 *     trustedCidrs: ['10.20.0.0/16'],
 *     ingressRules: [{ port: 443, cidr: '0.0.0.0/0', description: 'HTTPS' }],
 *     restrictEgress: true,
 * });
 * ```
 */
export class InstanceSecurityGroupConstruct extends Construct {
    /** The security group */
    public readonly securityGroup: ec2.SecurityGroup;

    private readonly rules: IngressRuleSummary[] = [];

    constructor(scope: Construct, id: string, props: InstanceSecurityGroupConstructProps) {
        super(scope, id);

        const namePrefix = props.namePrefix ?? 'ec2';
        const restrictEgress = props.restrictEgress ?? false;
        const trustedCidrs = props.trustedCidrs ?? [];

        if (props.remoteAccess && trustedCidrs.length === 0) {
            throw new Error(
                `Remote access (${props.remoteAccess}) requires at least one trusted CIDR. ` +
                'Use Session Manager instead of opening the port.',
            );
        }

        this.securityGroup = new ec2.SecurityGroup(this, 'SecurityGroup', {
            vpc: props.vpc,
            securityGroupName: `${namePrefix}-sg`,
            description: props.description ?? 'Security group for EC2 instances',
            allowAllOutbound: !restrictEgress,
        });

        // =================================================================
        // Egress
        // =================================================================
        if (restrictEgress) {
            this.securityGroup.addEgressRule(
                ec2.Peer.anyIpv4(),
                ec2.Port.tcp(HTTPS_PORT),
                'AWS APIs and HTTPS updates',
            );
            this.securityGroup.addEgressRule(
                ec2.Peer.anyIpv4(),
                ec2.Port.tcp(HTTP_PORT),
                'Package repository mirrors',
            );
        }

        // =================================================================
        // Ingress
        // =================================================================
        for (const rule of props.ingressRules ?? []) {
            this.addRule(rule);
        }

        if (props.remoteAccess) {
            const port = props.remoteAccess === 'ssh' ? SSH_PORT : RDP_PORT;
            const label = props.remoteAccess.toUpperCase();
            for (const cidr of trustedCidrs) {
                this.addRule({ port, cidr, description: `${label} access from ${describeCidr(cidr)}` });
            }
        }

        cdk.Tags.of(this.securityGroup).add('Component', 'SecurityGroup');
        cdk.Tags.of(this.securityGroup).add('Purpose', namePrefix);
    }

    /** Ingress rules added so far, in order */
    get ingressRules(): readonly IngressRuleSummary[] {
        return this.rules;
    }

    /**
     * Add an ingress rule after validating its source and ports.
     *
     * @throws Error on an invalid CIDR or port, on a rule with both or
     * neither of `cidr` / `sourceSecurityGroup`, or on ports given to icmp/all
     */
    addRule(rule: IngressRule): void {
        const protocol = rule.protocol ?? 'tcp';
        const { peer, source } = this.resolvePeer(rule);
        const { port, ports } = this.resolvePort(protocol, rule);

        if (rule.cidr === '0.0.0.0/0' && (this.covers(rule, SSH_PORT) || this.covers(rule, RDP_PORT))) {
            cdk.Annotations.of(this).addWarning(
                `Ingress rule '${rule.description}' opens a management port to 0.0.0.0/0. ` +
                'Restrict it to trusted CIDRs or use Session Manager.',
            );
        }

        this.securityGroup.addIngressRule(peer, port, rule.description);
        this.rules.push({ protocol, ports, source, description: rule.description });
    }

    private resolvePeer(rule: IngressRule): { peer: ec2.IPeer; source: string } {
        if (rule.cidr !== undefined && rule.sourceSecurityGroup !== undefined) {
            throw new Error(`Ingress rule '${rule.description}' sets both cidr and sourceSecurityGroup`);
        }
        if (rule.sourceSecurityGroup !== undefined) {
            return { peer: rule.sourceSecurityGroup, source: rule.sourceSecurityGroup.securityGroupId };
        }
        if (rule.cidr === undefined) {
            throw new Error(`Ingress rule '${rule.description}' needs a cidr or sourceSecurityGroup`);
        }
        assertValid(validateCidr(rule.cidr));
        return { peer: ec2.Peer.ipv4(rule.cidr), source: rule.cidr };
    }

    private resolvePort(protocol: IngressProtocol, rule: IngressRule): { port: ec2.Port; ports: string } {
        const hasPorts = rule.port !== undefined || rule.fromPort !== undefined || rule.toPort !== undefined;

        switch (protocol) {
            case 'all':
            case 'icmp':
                if (hasPorts) {
                    throw new Error(`Ingress rule '${rule.description}': protocol '${protocol}' cannot specify ports`);
                }
                return protocol === 'all'
                    ? { port: ec2.Port.allTraffic(), ports: 'all' }
                    : { port: ec2.Port.allIcmp(), ports: 'all' };
            case 'tcp':
            case 'udp': {
                if (rule.port !== undefined) {
                    assertValid(validatePort(rule.port));
                    const port = protocol === 'tcp' ? ec2.Port.tcp(rule.port) : ec2.Port.udp(rule.port);
                    return { port, ports: String(rule.port) };
                }
                if (rule.fromPort === undefined || rule.toPort === undefined) {
                    throw new Error(`Ingress rule '${rule.description}' needs port or fromPort/toPort`);
                }
                assertValid(validatePortRange(rule.fromPort, rule.toPort));
                const port = protocol === 'tcp'
                    ? ec2.Port.tcpRange(rule.fromPort, rule.toPort)
                    : ec2.Port.udpRange(rule.fromPort, rule.toPort);
                return { port, ports: `${rule.fromPort}-${rule.toPort}` };
            }
        }
    }

    private covers(rule: IngressRule, port: number): boolean {
        const protocol = rule.protocol ?? 'tcp';
        if (protocol === 'all') {
            return true;
        }
        if (protocol !== 'tcp') {
            return false;
        }
        if (rule.port !== undefined) {
            return rule.port === port;
        }
        return rule.fromPort !== undefined && rule.toPort !== undefined &&
            rule.fromPort <= port && port <= rule.toPort;
    }
}
