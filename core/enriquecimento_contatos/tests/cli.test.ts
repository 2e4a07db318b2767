import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { createStandardETLParser, lerEmpresasDeArquivo } from '../scripts/utils/cli/modern-etl-parser.js';
import { ValidacaoError } from '../scripts/utils/logging/index.js';

const parser = createStandardETLParser('contatos', 'Processador de Enriquecimento de Contatos');

describe('ModernETLCommandParser', () => {
  it('monta uma empresa a partir das flags com PostgreSQL como destino padrão', async () => {
    const options = await parser.parse([
      '--cnpj', '12.345.678/0001-95',
      '--nome', 'Empresa Exemplo',
      '--url', 'https://exemplo.example.com'
    ]);

    expect(options).toEqual({
      empresas: [{ cnpj: '12.345.678/0001-95', razaoSocial: 'Empresa Exemplo', url: 'https://exemplo.example.com' }],
      limite: undefined,
      destino: ['postgres'],
      concorrencia: undefined,
      timeout: undefined,
      tentativas: undefined,
      verbose: false,
      dryRun: false
    });
  });

  it('lê destinos e opções de execução', async () => {
    const options = await parser.parse([
      '--cnpj', '12345678000195',
      '--url', 'https://exemplo.example.com',
      '--pc', '--firestore',
      '--timeout', '2.5',
      '--concorrencia', '4',
      '--tentativas', '2',
      '--limite', '10',
      '--dry-run'
    ]);

    expect(options.destino).toEqual(['firestore', 'pc']);
    expect(options.timeout).toBe(2500);
    expect(options.concorrencia).toBe(4);
    expect(options.tentativas).toBe(2);
    expect(options.limite).toBe(10);
    expect(options.dryRun).toBe(true);
    expect(options.empresas[0].razaoSocial).toBe('');
  });

  it('exige CNPJ e URL quando não há arquivo', async () => {
    await expect(parser.parse(['--cnpj', '12345678000195'])).rejects.toThrow(
      'Informe --cnpj e --url, ou --arquivo com a lista de empresas'
    );
  });

  it('não aceita arquivo junto com empresa avulsa', async () => {
    await expect(parser.parse(['--arquivo', 'empresas.json', '--cnpj', '1', '--url', 'https://a.example.com'])).rejects.toThrow(
      'Use --arquivo ou --cnpj/--url, não ambos'
    );
  });

  it('recusa números não positivos', async () => {
    await expect(parser.parse(['--cnpj', '1', '--url', 'https://a.example.com', '--concorrencia', '0'])).rejects.toThrow(
      '--concorrencia deve ser um número maior que zero'
    );
  });

  it('recusa opções desconhecidas', async () => {
    await expect(parser.parse(['--cnpj', '1', '--url', 'https://a.example.com', '--desconhecida'])).rejects.toBeInstanceOf(
      ValidacaoError
    );
  });
});

describe('lerEmpresasDeArquivo', () => {
  let pasta: string;

  beforeEach(async () => {
    pasta = await fs.mkdtemp(path.join(os.tmpdir(), 'empresas-'));
  });

  afterEach(async () => {
    await fs.rm(pasta, { recursive: true, force: true });
  });

  async function arquivo(conteudo: string): Promise<string> {
    const caminho = path.join(pasta, 'empresas.json');
    await fs.writeFile(caminho, conteudo, 'utf8');
    return caminho;
  }

  it('aceita razao_social ou razaoSocial e redes sociais conhecidas', async () => {
    const caminho = await arquivo(JSON.stringify([
      {
        cnpj: 12345678000195,
        razao_social: 'Empresa Um',
        url: 'https://um.example.com',
        redes_sociais: { facebook: 'https://facebook.com/um', instagram: null }
      },
      { cnpj: '22333444000192', razaoSocial: 'Empresa Dois', url: 'https://dois.example.com' }
    ]));

    expect(await lerEmpresasDeArquivo(caminho)).toEqual([
      {
        cnpj: '12345678000195',
        razaoSocial: 'Empresa Um',
        url: 'https://um.example.com',
        redesSociais: { facebook: 'https://facebook.com/um' }
      },
      { cnpj: '22333444000192', razaoSocial: 'Empresa Dois', url: 'https://dois.example.com' }
    ]);
  });

  it('exige uma lista', async () => {
    const caminho = await arquivo('{"cnpj": "1"}');
    await expect(lerEmpresasDeArquivo(caminho)).rejects.toThrow(`${caminho} deve conter uma lista de empresas`);
  });

  it('exige URL em cada empresa', async () => {
    const caminho = await arquivo('[{"cnpj": "12345678000195"}]');
    await expect(lerEmpresasDeArquivo(caminho)).rejects.toThrow('Empresa na posição 0 sem URL');
  });

  it('é usado pelo parser com --arquivo', async () => {
    const caminho = await arquivo('[{"cnpj": "12345678000195", "url": "https://um.example.com"}]');
    const options = await parser.parse(['--arquivo', caminho, '--pc']);

    expect(options.empresas).toEqual([{ cnpj: '12345678000195', razaoSocial: '', url: 'https://um.example.com' }]);
    expect(options.destino).toEqual(['pc']);
  });
});
