/**
 * @format
 * Security Group Construct Unit Tests
 */

import { Annotations, Template } from 'aws-cdk-lib/assertions';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as cdk from 'aws-cdk-lib/core';

import {
    BaseSecurityGroupConstruct,
    IngressRule,
    InstanceSecurityGroupConstruct,
    InstanceSecurityGroupConstructProps,
} from '../../../../lib/common/security/security-group';
import {
    Match,
    StackAssertions,
    TEST_CIDRS,
    TEST_ENV,
    createMockSecurityGroup,
    createMockVpc,
    createTestApp,
    findIngressRulesByPort,
    singleResourceProperties,
} from '../../../fixtures';

function build(props: Partial<InstanceSecurityGroupConstructProps> = {}): {
    stack: cdk.Stack;
    construct: InstanceSecurityGroupConstruct;
    template: Template;
} {
    const stack = new cdk.Stack(createTestApp(), 'TestStack', { env: TEST_ENV });
    const vpc = createMockVpc(stack);
    const construct = new InstanceSecurityGroupConstruct(stack, 'SecurityGroup', { vpc, ...props });
    return { stack, construct, template: Template.fromStack(stack) };
}

describe('InstanceSecurityGroupConstruct', () => {
    describe('defaults', () => {
        const { template, construct } = build();

        it('should name the group from the prefix', () => {
            template.hasResourceProperties('AWS::EC2::SecurityGroup', {
                GroupName: 'ec2-sg',
                GroupDescription: 'Security group for EC2 instances',
            });
        });

        it('should allow all egress', () => {
            template.hasResourceProperties('AWS::EC2::SecurityGroup', {
                SecurityGroupEgress: [Match.objectLike({ CidrIp: '0.0.0.0/0', IpProtocol: '-1' })],
            });
        });

        it('should have no ingress rules', () => {
            expect(construct.ingressRules).toEqual([]);
            expect(singleResourceProperties(template, 'AWS::EC2::SecurityGroup').SecurityGroupIngress).toBeUndefined();
        });

        it('should tag the component', () => {
            StackAssertions.hasComponentTag(template, 'AWS::EC2::SecurityGroup', 'SecurityGroup');
        });
    });

    describe('ingress rules', () => {
        const { construct, template } = build({
            namePrefix: 'instance-staging',
            ingressRules: [
                { port: 443, cidr: '0.0.0.0/0', description: 'HTTPS' },
                { protocol: 'udp', fromPort: 5000, toPort: 5010, cidr: '10.0.0.0/8', description: 'Media' },
                { protocol: 'icmp', cidr: '10.0.0.0/8', description: 'Ping' },
            ],
        });

        it('should render a tcp port rule', () => {
            expect(findIngressRulesByPort(template, 443)).toEqual([
                { CidrIp: '0.0.0.0/0', Description: 'HTTPS', FromPort: 443, IpProtocol: 'tcp', ToPort: 443 },
            ]);
        });

        it('should render a udp range rule', () => {
            expect(findIngressRulesByPort(template, 5000)).toEqual([
                { CidrIp: '10.0.0.0/8', Description: 'Media', FromPort: 5000, IpProtocol: 'udp', ToPort: 5010 },
            ]);
        });

        it('should summarise rules in order', () => {
            expect(construct.ingressRules).toEqual([
                { protocol: 'tcp', ports: '443', source: '0.0.0.0/0', description: 'HTTPS' },
                { protocol: 'udp', ports: '5000-5010', source: '10.0.0.0/8', description: 'Media' },
                { protocol: 'icmp', ports: 'all', source: '10.0.0.0/8', description: 'Ping' },
            ]);
        });

        it('should tag the purpose with the prefix', () => {
            template.hasResourceProperties('AWS::EC2::SecurityGroup', {
                Tags: Match.arrayWith([Match.objectLike({ Key: 'Purpose', Value: 'instance-staging' })]),
            });
        });
    });

    describe('remote access', () => {
        it('should open SSH to each trusted CIDR', () => {
            const { template } = build({ remoteAccess: 'ssh', trustedCidrs: TEST_CIDRS.multiple });

            expect(findIngressRulesByPort(template, 22)).toEqual([
                { CidrIp: '10.0.0.1/32', Description: 'SSH access from IP 10.0.0.1', FromPort: 22, IpProtocol: 'tcp', ToPort: 22 },
                {
                    CidrIp: '192.168.1.0/24',
                    Description: 'SSH access from CIDR 192.168.1.0/24',
                    FromPort: 22,
                    IpProtocol: 'tcp',
                    ToPort: 22,
                },
            ]);
        });

        it('should open RDP for Windows fleets', () => {
            const { template } = build({ remoteAccess: 'rdp', trustedCidrs: TEST_CIDRS.network });

            expect(findIngressRulesByPort(template, 3389)).toEqual([
                {
                    CidrIp: '172.16.0.0/16',
                    Description: 'RDP access from CIDR 172.16.0.0/16',
                    FromPort: 3389,
                    IpProtocol: 'tcp',
                    ToPort: 3389,
                },
            ]);
            expect(findIngressRulesByPort(template, 22)).toEqual([]);
        });

        it('should require trusted CIDRs', () => {
            expect(() => build({ remoteAccess: 'ssh' })).toThrow(
                'Remote access (ssh) requires at least one trusted CIDR. Use Session Manager instead of opening the port.',
            );
        });

        it('should warn when a management port is open to the internet', () => {
            const { stack } = build({ ingressRules: [{ port: 22, cidr: '0.0.0.0/0', description: 'Open SSH' }] });

            Annotations.fromStack(stack).hasWarning(
                '/TestStack/SecurityGroup',
                Match.stringLikeRegexp("Ingress rule 'Open SSH' opens a management port to 0.0.0.0/0"),
            );
        });

        it('should not warn for application ports', () => {
            const { stack } = build({ ingressRules: [{ port: 443, cidr: '0.0.0.0/0', description: 'HTTPS' }] });

            Annotations.fromStack(stack).hasNoWarning('*', Match.stringLikeRegexp('management port'));
        });
    });

    describe('restricted egress', () => {
        const { template } = build({ restrictEgress: true });

        it('should allow only HTTPS and HTTP out', () => {
            expect(singleResourceProperties(template, 'AWS::EC2::SecurityGroup').SecurityGroupEgress).toEqual([
                { CidrIp: '0.0.0.0/0', Description: 'AWS APIs and HTTPS updates', FromPort: 443, IpProtocol: 'tcp', ToPort: 443 },
                { CidrIp: '0.0.0.0/0', Description: 'Package repository mirrors', FromPort: 80, IpProtocol: 'tcp', ToPort: 80 },
            ]);
        });
    });

    describe('addRule', () => {
        it('should add a rule from a peer security group as a separate resource', () => {
            const stack = new cdk.Stack(createTestApp(), 'TestStack', { env: TEST_ENV });
            const vpc = createMockVpc(stack);
            const peer = createMockSecurityGroup(stack, vpc);
            const construct = new InstanceSecurityGroupConstruct(stack, 'SecurityGroup', { vpc });

            construct.addRule({ port: 8080, sourceSecurityGroup: peer, description: 'From load balancer' });
            const template = Template.fromStack(stack);

            template.hasResourceProperties('AWS::EC2::SecurityGroupIngress', {
                IpProtocol: 'tcp',
                FromPort: 8080,
                ToPort: 8080,
                Description: 'From load balancer',
            });
            expect(construct.ingressRules[0].ports).toBe('8080');
        });

        it.each<[IngressRule, string]>([
            [{ description: 'no source', port: 80 }, "Ingress rule 'no source' needs a cidr or sourceSecurityGroup"],
            [{ description: 'no port', cidr: '10.0.0.0/8' }, "Ingress rule 'no port' needs port or fromPort/toPort"],
            [
                { description: 'all with port', protocol: 'all', port: 80, cidr: '10.0.0.0/8' },
                "Ingress rule 'all with port': protocol 'all' cannot specify ports",
            ],
            [{ description: 'bad cidr', port: 80, cidr: '10.0.0.0' }, 'Invalid CIDR format: 10.0.0.0'],
            [{ description: 'bad port', port: 70000, cidr: '10.0.0.0/8' }, 'Invalid port number: 70000. Must be 1-65535'],
        ])('should reject %o', (rule, message) => {
            const { construct } = build();
            expect(() => construct.addRule(rule)).toThrow(message);
        });

        it('should reject both cidr and sourceSecurityGroup', () => {
            const { construct, stack } = build();
            const peer = ec2.SecurityGroup.fromSecurityGroupId(stack, 'Peer', 'sg-12345678');

            expect(() =>
                construct.addRule({ port: 80, cidr: '10.0.0.0/8', sourceSecurityGroup: peer, description: 'both' }),
            ).toThrow("Ingress rule 'both' sets both cidr and sourceSecurityGroup");
        });
    });
});

describe('BaseSecurityGroupConstruct', () => {
    const buildBase = (allowAllOutbound?: boolean) => {
        const stack = new cdk.Stack(createTestApp(), 'TestStack', { env: TEST_ENV });
        const vpc = createMockVpc(stack);
        const construct = new BaseSecurityGroupConstruct(stack, 'Bastion', {
            vpc,
            securityGroupName: 'bastion-sg',
            description: 'Security group for the bastion host',
            namePrefix: 'bastion',
            allowAllOutbound,
        });
        return { stack, vpc, construct };
    };

    it('should create a group with no ingress and a component tag', () => {
        const { stack } = buildBase();

        Template.fromStack(stack).hasResourceProperties('AWS::EC2::SecurityGroup', {
            GroupName: 'bastion-sg',
            GroupDescription: 'Security group for the bastion host',
            SecurityGroupEgress: [{ CidrIp: '0.0.0.0/0', IpProtocol: '-1' }],
            SecurityGroupIngress: Match.absent(),
            Tags: [{ Key: 'Component', Value: 'bastion-security-group' }],
        });
    });

    it('should add CIDR ingress inline', () => {
        const { stack, construct } = buildBase();
        construct.addIngressFromCidr('10.0.0.0/16', 22, 'SSH from the VPC');

        Template.fromStack(stack).hasResourceProperties('AWS::EC2::SecurityGroup', {
            GroupName: 'bastion-sg',
            SecurityGroupIngress: [
                { CidrIp: '10.0.0.0/16', FromPort: 22, ToPort: 22, IpProtocol: 'tcp', Description: 'SSH from the VPC' },
            ],
        });
    });

    it('should add security group ingress as a separate rule', () => {
        const { stack, vpc, construct } = buildBase();
        const peer = createMockSecurityGroup(stack, vpc, 'Peer');
        construct.addIngressFromSecurityGroup(peer, 443, 'HTTPS from peers');

        Template.fromStack(stack).hasResourceProperties('AWS::EC2::SecurityGroupIngress', {
            IpProtocol: 'tcp',
            FromPort: 443,
            ToPort: 443,
            Description: 'HTTPS from peers',
        });
    });

    it('should validate CIDR and port', () => {
        const { construct } = buildBase(false);

        expect(() => construct.addIngressFromCidr('10.0.0.0', 22, 'bad')).toThrow('Invalid CIDR format: 10.0.0.0');
        expect(() => construct.addIngressFromCidr('10.0.0.0/16', 0, 'bad')).toThrow(
            'Invalid port number: 0. Must be 1-65535',
        );
    });
});
