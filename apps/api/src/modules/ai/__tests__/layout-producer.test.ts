import { describe, it, expect, vi, afterEach } from 'vitest';
import { ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NoJsonObjectFoundError } from '@sheetplan/shared';
import { LayoutProducerService } from '../layout-producer.service';
import { LayoutPromptBuilderService } from '../layout-prompt-builder.service';
import { OpenAIClientService } from '../openai-client.service';
import { accountDocument, createEngine, producerText } from '../../layout/__tests__/fixtures';

const { assembler, ingestor } = createEngine();

function setup() {
  const client = new OpenAIClientService(new ConfigService({}));
  client.onModuleInit();
  const producer = new LayoutProducerService(client, new LayoutPromptBuilderService(), ingestor);
  return { client, producer };
}

describe('LayoutProducerService', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('is unavailable without an API key', async () => {
    const { client, producer } = setup();
    expect(client.isAvailable()).toBe(false);
    await expect(producer.generate([accountDocument()])).rejects.toBeInstanceOf(ServiceUnavailableException);
  });

  it('ingests the model answer into a layout', async () => {
    const { client, producer } = setup();
    const expected = assembler.assemble([accountDocument()]);
    vi.spyOn(client, 'isAvailable').mockReturnValue(true);
    const chat = vi.spyOn(client, 'chat').mockResolvedValue({
      content: `Sure.\n\`\`\`json\n${producerText(expected)}\n\`\`\``,
      finishReason: 'stop',
    });

    await expect(producer.generate([accountDocument()])).resolves.toEqual(expected);
    expect(chat).toHaveBeenCalledTimes(1);
    expect(chat).toHaveBeenCalledWith(expect.objectContaining({ responseFormat: 'json', temperature: 0 }));
  });

  it('surfaces unreadable answers as ingestion errors', async () => {
    const { client, producer } = setup();
    vi.spyOn(client, 'isAvailable').mockReturnValue(true);
    vi.spyOn(client, 'chat').mockResolvedValue({ content: 'I cannot help with that.', finishReason: 'stop' });

    await expect(producer.generate([accountDocument()])).rejects.toBeInstanceOf(NoJsonObjectFoundError);
  });

  it('enables the client when a key is configured', () => {
    const client = new OpenAIClientService(new ConfigService({ AI_API_KEY: 'test-secret' }));
    client.onModuleInit();
    expect(client.isAvailable()).toBe(true);
  });
});
