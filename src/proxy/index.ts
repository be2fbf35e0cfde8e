export { type BootstrapOptions, buildPlaybookArgs, runProxyBootstrap } from "./ansible";
export { type CertDeployResult, type CertificateFiles, deployCertificate } from "./cert-deploy";
