import { AzureChatOpenAI } from '@langchain/openai';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { createReactAgent } from '@langchain/langgraph/prebuilt';
import { getSystemPrompt } from './systemPrompt';
import { toTool, type Capability } from '../tools/capability';

export interface AssistantResponse {
  content: unknown;
}

/** The external assistant as seen by a persona service. */
export interface AssistantClient {
  getResponse(prompt: string): Promise<AssistantResponse>;
}

export interface AzureAgentConfig {
  endpoint: string;
  apiKey: string;
  deploymentName: string;
  apiVersion: string;
  temperature?: number;
}

export interface AgentDefinition {
  instructions: string;
  capabilities: readonly Capability[];
}

type ReactAgent = ReturnType<typeof createReactAgent>;

/**
 * ReAct agent over an Azure OpenAI deployment, bound to one persona's
 * instructions and capabilities at construction.
 */
export class PersonaAgent implements AssistantClient {
  private readonly agent: ReactAgent;
  private readonly instructions: string;

  constructor(definition: AgentDefinition, config: AzureAgentConfig) {
    const llm = new AzureChatOpenAI({
      azureOpenAIApiKey: config.apiKey,
      azureOpenAIEndpoint: config.endpoint,
      azureOpenAIApiDeploymentName: config.deploymentName,
      azureOpenAIApiVersion: config.apiVersion,
      temperature: config.temperature ?? 0.2,
    });

    this.instructions = definition.instructions;
    this.agent = createReactAgent({
      llm,
      tools: definition.capabilities.map(toTool),
    });
  }

  async getResponse(prompt: string): Promise<AssistantResponse> {
    const systemMessage = new SystemMessage(
      getSystemPrompt(this.instructions, {
        timeZone: Intl.DateTimeFormat().resolvedOptions().timeZone,
      })
    );
    const result = await this.agent.invoke({ messages: [systemMessage, new HumanMessage(prompt)] });
    const last = result.messages.at(-1);
    return { content: last?.content };
  }
}
