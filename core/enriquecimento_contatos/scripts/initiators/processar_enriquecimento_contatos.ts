/**
 * 📇 Processador de Enriquecimento de Contatos
 *
 * Baixa o site de cada empresa, extrai telefones, WhatsApp, e-mails,
 * endereço e redes sociais e grava um registro por CNPJ nos destinos
 * escolhidos.
 *
 * @example
 * ```bash
 * npm run contatos -- --cnpj 12345678000195 --nome "Empresa Exemplo" --url https://exemplo.com.br --pc
 * npm run contatos -- --arquivo empresas.json --limite 20 --postgres --firestore
 * ```
 */

import { EnriquecimentoContatosProcessor } from '../processors/enriquecimento-contatos.processor.js';
import { createStandardETLParser } from '../utils/cli/modern-etl-parser.js';
import { runEtlProcessor } from '../utils/etl/run-etl-processor.js';

async function main(argv?: string[]): Promise<number> {
  return runEtlProcessor({
    cliParser: createStandardETLParser('contatos', 'Processador de Enriquecimento de Contatos'),
    criarProcessador: (options, repositorios) => new EnriquecimentoContatosProcessor(options, { repositorios }),
    scriptName: 'Enriquecimento de Contatos',
    argv
  });
}

function isMainModule(metaUrl: string): boolean {
  const modulePath = new URL(metaUrl).pathname;
  const mainScriptPath = process.argv[1];
  return mainScriptPath !== undefined && modulePath.endsWith(mainScriptPath.replace(/\\/g, '/'));
}

if (isMainModule(import.meta.url)) {
  main()
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      console.error(`💥 Erro não capturado: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    });
}

export { main };
