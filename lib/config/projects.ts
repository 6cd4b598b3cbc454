/**
 * @format
 * Project Configuration
 *
 * Defines the example projects and their metadata.
 * Each project composes the reusable constructs into deployable stacks.
 */

/**
 * Available projects in this repository.
 */
export enum Project {
    /** Standalone EC2 instances */
    INSTANCE = 'instance',
    /** Auto Scaling group fleet */
    AUTOSCALING = 'autoscaling',
}

/**
 * Project metadata configuration
 */
export interface ProjectConfig {
    /** Display name for the project */
    readonly displayName: string;
    /** Short description */
    readonly description: string;
    /** Stack namespace prefix */
    readonly namespace: string;
}

/**
 * Project configurations mapped by project enum
 */
export const PROJECT_CONFIGS: Record<Project, ProjectConfig> = {
    [Project.INSTANCE]: {
        displayName: 'EC2 Instance',
        description: 'Standalone EC2 instances with security group and instance role',
        namespace: 'Ec2Instance',
    },
    [Project.AUTOSCALING]: {
        displayName: 'Auto Scaling',
        description: 'Auto Scaling group fleet from a launch template or direct instance settings',
        namespace: 'Ec2Fleet',
    },
} as const;

/**
 * Get project configuration by project enum
 */
export function getProjectConfig(project: Project): ProjectConfig {
    return PROJECT_CONFIGS[project];
}

/**
 * Check if a string is a valid project
 */
export function isValidProject(value: string): value is Project {
    const names: string[] = Object.values(Project);
    return names.includes(value);
}

/**
 * Get all available project names
 */
export function getAvailableProjects(): Project[] {
    return Object.values(Project);
}
