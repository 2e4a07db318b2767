/**
 * Parser de linha de comando com yargs
 *
 * Uma empresa por flags (`--cnpj --nome --url`) ou uma lista em JSON
 * (`--arquivo empresas.json`).
 */

import yargs from 'yargs/yargs';
import * as fs from 'fs/promises';
import { ValidacaoError, descreverErro, logger, LogLevel } from '../logging/index.js';
import { lerRedesSociais } from '../../carregamento/repositorio.js';
import { REDES_SOCIAIS_SUPORTADAS } from '../../types/index.js';
import type { Destino, EmpresaAlvo, ETLOptions, RedesSociais } from '../../types/index.js';
import { etlConfig } from '../../../../../config/index.js';

function redesInformadas(valor: unknown): Partial<RedesSociais> | undefined {
  if (valor === undefined || valor === null) {
    return undefined;
  }

  const redes = lerRedesSociais(valor);
  const informadas: Partial<RedesSociais> = {};
  for (const rede of REDES_SOCIAIS_SUPORTADAS) {
    const link = redes[rede];
    if (link) {
      informadas[rede] = link;
    }
  }
  return informadas;
}

function campoTexto(registro: object, ...nomes: string[]): unknown {
  for (const nome of nomes) {
    const valor: unknown = Reflect.get(registro, nome);
    if (valor !== undefined && valor !== null) {
      return valor;
    }
  }
  return undefined;
}

/**
 * Lê a lista de empresas de um arquivo JSON
 *
 * Cada item precisa de `cnpj` e `url`; `razao_social` (ou `razaoSocial`) e
 * `redes_sociais` são opcionais. O CNPJ é validado depois, empresa a empresa.
 */
export async function lerEmpresasDeArquivo(caminho: string): Promise<EmpresaAlvo[]> {
  let conteudo: unknown;
  try {
    conteudo = JSON.parse(await fs.readFile(caminho, 'utf8'));
  } catch (error) {
    throw new ValidacaoError(`Não foi possível ler ${caminho}: ${descreverErro(error)}`, 'arquivo');
  }

  if (!Array.isArray(conteudo)) {
    throw new ValidacaoError(`${caminho} deve conter uma lista de empresas`, 'arquivo');
  }

  return conteudo.map((registro: unknown, indice): EmpresaAlvo => {
    if (typeof registro !== 'object' || registro === null) {
      throw new ValidacaoError(`Empresa na posição ${indice} não é um objeto`, 'arquivo');
    }

    const cnpj = campoTexto(registro, 'cnpj');
    const url = campoTexto(registro, 'url', 'site');
    const razaoSocial = campoTexto(registro, 'razao_social', 'razaoSocial', 'nome');

    if (typeof cnpj !== 'string' && typeof cnpj !== 'number') {
      throw new ValidacaoError(`Empresa na posição ${indice} sem CNPJ`, 'cnpj');
    }
    if (typeof url !== 'string') {
      throw new ValidacaoError(`Empresa na posição ${indice} sem URL`, 'url');
    }

    return {
      cnpj: String(cnpj),
      razaoSocial: typeof razaoSocial === 'string' ? razaoSocial : '',
      url,
      redesSociais: redesInformadas(campoTexto(registro, 'redes_sociais', 'redesSociais'))
    };
  });
}

/**
 * Parser da linha de comando do processador de contatos
 */
export class ModernETLCommandParser {
  constructor(
    private readonly scriptName: string,
    private readonly description: string
  ) {}

  private construir(args: string[]) {
    return yargs(args)
      .scriptName(`npm run ${this.scriptName} --`)
      .usage(this.description)
      .version(false)
      .strict()

      // Empresa
      .option('cnpj', {
        type: 'string',
        description: 'CNPJ da empresa (com ou sem máscara)'
      })
      .option('nome', {
        type: 'string',
        description: 'Razão social da empresa'
      })
      .option('url', {
        type: 'string',
        description: 'Site da empresa (http ou https)'
      })
      .option('arquivo', {
        alias: 'a',
        type: 'string',
        description: 'Arquivo JSON com a lista de empresas'
      })

      // Execução
      .option('limite', {
        type: 'number',
        description: 'Processa no máximo N empresas'
      })
      .option('concorrencia', {
        type: 'number',
        description: `Empresas processadas em paralelo (padrão: ${etlConfig.scraper.concurrency})`
      })
      .option('timeout', {
        type: 'number',
        description: `Tempo máximo de download em segundos (padrão: ${etlConfig.scraper.timeout / 1000})`
      })
      .option('tentativas', {
        type: 'number',
        description: `Tentativas de download por empresa (padrão: ${etlConfig.scraper.maxRetries})`
      })

      // Destinos
      .option('postgres', {
        type: 'boolean',
        description: 'Salva no PostgreSQL - PADRÃO'
      })
      .option('firestore', {
        type: 'boolean',
        description: 'Salva no Firestore (produção)'
      })
      .option('emulator', {
        type: 'boolean',
        description: 'Usa o Firestore Emulator'
      })
      .option('pc', {
        alias: 'local',
        type: 'boolean',
        description: 'Salva localmente no PC'
      })

      .option('verbose', {
        alias: 'v',
        type: 'boolean',
        description: 'Modo verboso com logs detalhados'
      })
      .option('dry-run', {
        type: 'boolean',
        description: 'Simula execução sem salvar dados'
      })

      .check(args => {
        if (args.arquivo && (args.cnpj || args.url)) {
          throw new Error('Use --arquivo ou --cnpj/--url, não ambos');
        }
        if (!args.arquivo && (!args.cnpj || !args.url)) {
          throw new Error('Informe --cnpj e --url, ou --arquivo com a lista de empresas');
        }
        for (const nome of ['limite', 'concorrencia', 'timeout', 'tentativas'] as const) {
          const valor = args[nome];
          if (valor !== undefined && (!Number.isFinite(valor) || valor <= 0)) {
            throw new Error(`--${nome} deve ser um número maior que zero`);
          }
        }
        return true;
      })
      .example(`npm run ${this.scriptName} -- --cnpj 12.345.678/0001-95 --nome "Empresa Exemplo" --url https://exemplo.com.br`, 'Uma empresa, salvando no PostgreSQL')
      .example(`npm run ${this.scriptName} -- --arquivo empresas.json --pc --limite 10`, 'Lista de empresas, salvando em JSON local')
      .fail((mensagem, erro) => {
        throw erro ?? new ValidacaoError(mensagem, 'argumentos');
      })
      .help()
      .alias('help', 'h');
  }

  /**
   * Lê os argumentos e monta as opções do processador
   */
  async parse(argv: string[] = process.argv.slice(2)): Promise<ETLOptions> {
    const args = this.construir(argv).parseSync();

    const destino: Destino[] = [];
    if (args.postgres) destino.push('postgres');
    if (args.firestore) destino.push('firestore');
    if (args.emulator) destino.push('emulator');
    if (args.pc) destino.push('pc');
    if (destino.length === 0) destino.push('postgres');

    const empresas = args.arquivo
      ? await lerEmpresasDeArquivo(args.arquivo)
      : [{ cnpj: args.cnpj ?? '', razaoSocial: args.nome ?? '', url: args.url ?? '' }];

    if (args.verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }

    return {
      empresas,
      limite: args.limite,
      destino,
      concorrencia: args.concorrencia,
      timeout: args.timeout !== undefined ? Math.round(args.timeout * 1000) : undefined,
      tentativas: args.tentativas,
      verbose: args.verbose ?? false,
      dryRun: args['dry-run'] ?? false
    };
  }
}

/**
 * Parser padrão do processador de contatos
 */
export function createStandardETLParser(scriptName: string, description: string): ModernETLCommandParser {
  return new ModernETLCommandParser(scriptName, description);
}
