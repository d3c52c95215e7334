import { createPipelineConfig } from '../../src/config/pipeline-config';
import {
  buildDeployScriptPrompt,
  buildDockerfilePrompt,
  buildInfrastructureStage1Prompt,
  buildInfrastructureStage2Prompt,
  buildManifestsPrompt,
  buildSetupScriptPrompt,
  buildVariablesPrompt,
  buildWorkflowPrompt,
  CONNECTION_CHECK_PROMPT,
} from '../../src/prompts';

const config = createPipelineConfig({
  clusterName: 'demo-cluster',
  region: 'eu-west-1',
  accountId: '210987654321',
  ecrRepositoryName: 'demo-repo',
  nodeInstanceTypes: ['t3.large', 'm5.large'],
  appName: 'shop',
  appPort: 8080,
  replicas: 3,
});

describe('prompt builders', () => {
  test('connection check asks for a fixed greeting', () => {
    expect(CONNECTION_CHECK_PROMPT).toBe("Say 'Hello, infra-forge!' and nothing else.");
  });

  test('stage 1 lists the cluster settings', () => {
    const prompt = buildInfrastructureStage1Prompt(config);
    expect(prompt).toContain('- Cluster name: demo-cluster\n');
    expect(prompt).toContain('- Region: eu-west-1\n');
    expect(prompt).toContain('- VPC CIDR: 10.0.0.0/16\n');
    expect(prompt).toContain('- Node instance types: ["t3.large", "m5.large"]\n');
    expect(prompt).toContain('- Desired capacity: 2\n- Min capacity: 1\n- Max capacity: 4\n');
    expect(prompt).toContain('- ECR repository name: demo-repo\n');
  });

  test('stage 2 keeps the Terraform interpolation literal', () => {
    const prompt = buildInfrastructureStage2Prompt(config);
    expect(prompt).toContain('file("${path.module}/iam-policy.json")');
    expect(prompt).toContain('The EKS cluster "demo-cluster" in region eu-west-1');
  });

  test('variables carry the configured defaults', () => {
    const prompt = buildVariablesPrompt(config);
    expect(prompt).toContain('- cluster_name (default: "demo-cluster")');
    expect(prompt).toContain('- node_instance_types (default: ["t3.large", "m5.large"])');
    expect(prompt).toContain('- max_capacity (default: 4)');
  });

  test('manifests hardcode the ECR image and name each resource', () => {
    const prompt = buildManifestsPrompt(config);
    expect(prompt).toContain('   - 210987654321.dkr.ecr.eu-west-1.amazonaws.com/demo-repo:latest\n');
    expect(prompt).toContain('   - Name: shop\n   - Replicas: 3\n');
    expect(prompt).toContain('   - Name: shop-service\n');
    expect(prompt).toContain('   - Name: shop-ingress\n');
    expect(prompt).toContain('   - Backend: shop-service:8080\n');
    expect(prompt).toContain('- Separate them using `---`');
    expect(prompt).toContain('do not use ${{ secrets.* }} expressions');
  });

  test('workflow names the cluster and repository', () => {
    const prompt = buildWorkflowPrompt(config);
    expect(prompt).toContain('configures it for the EKS cluster "demo-cluster"');
    expect(prompt).toContain('target ECR repo name (demo-repo)');
  });

  test('dockerfile exposes the app port', () => {
    expect(buildDockerfilePrompt(config)).toContain('6. Exposes port 8080\n');
  });

  test('scripts mention cluster and image', () => {
    expect(buildSetupScriptPrompt(config)).toContain('cluster "demo-cluster" in region eu-west-1');
    const deploy = buildDeployScriptPrompt(config);
    expect(deploy).toContain('"shop" (source: https://github.com/example/sample-node-project)');
    expect(deploy).toContain('- Push to ECR (210987654321.dkr.ecr.eu-west-1.amazonaws.com/demo-repo:latest)');
  });

  test('builders are pure', () => {
    expect(buildManifestsPrompt(config)).toBe(buildManifestsPrompt(config));
  });
});
