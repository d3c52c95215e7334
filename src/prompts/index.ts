/**
 * Prompt builders, one per generated artifact.
 *
 * Each builder is a pure function of the pipeline config. The wording
 * asks for bare file contents; the extractors cope when the model wraps
 * them in fences anyway.
 */

import { ecrImage, PipelineConfig } from '../config/pipeline-config';

/** Sent once before the pipeline starts to check credentials and reachability. */
export const CONNECTION_CHECK_PROMPT = "Say 'Hello, infra-forge!' and nothing else.";

function formatList(values: string[]): string {
  return `[${values.map((v) => JSON.stringify(v)).join(', ')}]`;
}

export function buildInfrastructureStage1Prompt(config: PipelineConfig): string {
  return `Generate a complete Terraform main.tf file for AWS EKS base infrastructure with the following specifications:

CONFIGURATION:
- Cluster name: ${config.clusterName}
- Region: ${config.region}
- VPC CIDR: ${config.vpcCidr}
- Node instance types: ${formatList(config.nodeInstanceTypes)}
- Desired capacity: ${config.desiredCapacity}
- Min capacity: ${config.minCapacity}
- Max capacity: ${config.maxCapacity}
- ECR repository name: ${config.ecrRepositoryName}

INCLUDE THE FOLLOWING COMPONENTS:
1. Terraform providers (aws, tls)
2. VPC with ONLY public subnets across 2 Availability Zones (no private subnets)
3. Internet Gateway for public internet access
4. Route table and associations for public subnets
5. EKS cluster and managed node group using public subnets
6. IAM roles for EKS cluster and node group
7. OIDC provider configuration for service accounts (IRSA)
8. Security groups for EKS control plane and worker nodes
9. ECR repository with lifecycle policy
10. Outputs for VPC ID, Public Subnet IDs, Cluster Name, Cluster Endpoint, EKS Role ARN, OIDC URL

IMPORTANT:
- Use correct resource dependencies
- Follow AWS EKS best practices
- Include proper tagging
- Do not include ALB Controller resources or Kubernetes provider config
- Use data sources for availability zones

Return ONLY the complete Terraform code, no explanations or comments outside the code.`;
}

export function buildInfrastructureStage2Prompt(config: PipelineConfig): string {
  return `Generate a Terraform main.tf file to deploy the AWS ALB Controller on an existing EKS cluster with the following setup:

ASSUMPTIONS:
- The EKS cluster "${config.clusterName}" in region ${config.region} is already deployed using Terraform
- The OIDC provider is already created
- The IAM policy file for ALB Controller (iam-policy.json) is manually downloaded and placed in the same folder
- Terraform has access to kubeconfig (either via AWS CLI or local file)

INCLUDE THE FOLLOWING COMPONENTS:
1. Terraform providers: aws, kubernetes, helm
2. Kubernetes provider configuration using data from the existing EKS cluster
3. IAM Role for the ALB Controller with:
   - IAM Policy loaded from a local file (iam-policy.json) using: file("\${path.module}/iam-policy.json")
   - Trust relationship with the EKS OIDC provider and namespace \`kube-system\`, service account \`aws-load-balancer-controller\`
4. Kubernetes service account for the ALB Controller in \`kube-system\` namespace
5. Helm release to install AWS Load Balancer Controller
6. Required labels and annotations to bind IAM role to the service account (IRSA)
7. Outputs: IAM Role ARN, ALB Controller Helm release name, service account name

REQUIREMENTS:
- Use \`data\` blocks to fetch existing EKS cluster name, OIDC provider URL, and region
- Ensure the IAM role uses proper assume role policy for service account via OIDC
- Set proper \`depends_on\` relationships where needed (e.g., Helm release depends on service account and IAM role)
- Do not include VPC, EKS, or OIDC creation in this file
- Follow AWS and Kubernetes best practices throughout

Return ONLY the complete Terraform code.`;
}

export function buildVariablesPrompt(config: PipelineConfig): string {
  return `Generate a Terraform variables.tf file for the EKS infrastructure with:
- cluster_name (default: "${config.clusterName}")
- region (default: "${config.region}")
- vpc_cidr (default: "${config.vpcCidr}")
- node_instance_types (default: ${formatList(config.nodeInstanceTypes)})
- desired_capacity (default: ${config.desiredCapacity})
- min_capacity (default: ${config.minCapacity})
- max_capacity (default: ${config.maxCapacity})
- environment (default: "dev")
- tags (map of strings)

Include proper descriptions and types for all variables.
Return ONLY the Terraform variables code.`;
}

export function buildManifestsPrompt(config: PipelineConfig): string {
  const name = config.appName;
  const port = config.appPort;
  return `Generate Kubernetes YAML manifests for deploying a Node.js application on AWS EKS using ALB Ingress Controller.

Configuration:

1. Image:
   - ${ecrImage(config)}
   - Hardcode this final ECR image URL in the manifest (do not use \${{ secrets.* }} expressions).

2. Deployment:
   - Name: ${name}
   - Replicas: ${config.replicas}
   - Labels: \`app: ${name}\`
   - Container:
     - Name: ${name}
     - Image: ECR URL (as above)
     - Port: ${port}
     - readinessProbe: HTTP GET \`/\` on port ${port}
     - livenessProbe: HTTP GET \`/\` on port ${port}
     - initialDelaySeconds: 10
     - periodSeconds: 10
     - Resources:
       - Requests: cpu: 100m, memory: 128Mi
       - Limits: cpu: 500m, memory: 256Mi

3. Service:
   - Type: ClusterIP
   - Name: ${name}-service
   - Selector: app: ${name}
   - Port: ${port} (port and targetPort)

4. Ingress:
   - Name: ${name}-ingress
   - Path: \`/\`
   - Backend: ${name}-service:${port}
   - Annotations (for ALB Ingress Controller):
     - \`kubernetes.io/ingress.class: alb\`
     - \`alb.ingress.kubernetes.io/scheme: internet-facing\`
     - \`alb.ingress.kubernetes.io/target-type: ip\`
     - \`alb.ingress.kubernetes.io/backend-protocol: HTTP\`
     - \`alb.ingress.kubernetes.io/listen-ports: '[{"HTTP":80}]'\`

Output:
- Combine all three manifests (Deployment, Service, Ingress)
- Separate them using \`---\`
- Output valid Kubernetes YAML`;
}

export function buildWorkflowPrompt(config: PipelineConfig): string {
  return `Write a GitHub Actions workflow in YAML that:

1. Builds a Docker image from the project root
2. Tags and pushes it to AWS ECR
3. Sets up kubectl and configures it for the EKS cluster "${config.clusterName}"
4. Applies \`deployment.yaml\`, \`service.yaml\`, and \`ingress.yaml\` using kubectl

Environment details:
- Use \`AWS_REGION\`, \`AWS_ACCESS_KEY_ID\`, \`AWS_SECRET_ACCESS_KEY\`, \`AWS_ACCOUNT_ID\` from GitHub secrets
- \`ECR_REPOSITORY\` is the target ECR repo name (${config.ecrRepositoryName})

Respond with only the content of \`.github/workflows/deploy.yml\`. No markdown or explanation.`;
}

export function buildDockerfilePrompt(config: PipelineConfig): string {
  return `Generate a Dockerfile for a Node.js application that:

1. Uses node:18-slim as the base image
2. Sets the working directory to /app
3. Copies package*.json and installs production dependencies with npm install --omit=dev
4. Copies the rest of the app code
5. Runs npm install again to ensure dependencies are installed
6. Exposes port ${config.appPort}
7. Uses node app.js as the default command

Do not wrap the output in \`\`\` or any markdown.
Do not include any explanation or "Before running" section.
Just return clean, ready to use Dockerfile code only.`;
}

export function buildSetupScriptPrompt(config: PipelineConfig): string {
  return `Generate a bash script for setting up the EKS environment for cluster "${config.clusterName}" in region ${config.region} with:
- AWS CLI configuration check
- kubectl installation check
- Terraform initialization (terraform/Stage1, then terraform/Stage2)
- EKS cluster creation
- kubectl configuration
- ALB controller installation
- Cluster validation

Script should be production-ready with error handling.`;
}

export function buildDeployScriptPrompt(config: PipelineConfig): string {
  return `Generate a bash script for deploying the Node.js application "${config.appName}" (source: ${config.appRepository}) with:
- Build Docker image
- Push to ECR (${ecrImage(config)})
- Update Kubernetes manifests
- Deploy to EKS cluster "${config.clusterName}"
- Health check validation
- Rollback capability

Script should include proper error handling and logging.`;
}
